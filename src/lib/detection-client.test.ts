import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { DetectionClient, parseDetectionResponse } from './detection-client';
import { LocalError, SchemaError } from './errors';
import type { CaptureEvent } from './types';

const DETECTION_URL = 'http://detector.test/infer';

let dir: string;
let event: CaptureEvent;

beforeAll(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-detect-'));
  const imagePath = path.join(dir, 'frame001.jpg');
  await fs.writeFile(imagePath, Buffer.from('not really a jpeg'));
  event = { id: 'evt-1', imagePath, capturedAt: '2026-01-01T00:00:00.000Z', caption: 'a red chair' };
});

afterAll(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function stubFetch(res: Response) {
  const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(res);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('parseDetectionResponse', () => {
  it('reads the detection service shape', () => {
    const result = parseDetectionResponse(
      {
        image: { width: 640, height: 480 },
        prompts: ['red chair'],
        detections: [{ label: 'red chair', bbox: [10, 20, 110, 220], score: 0.82 }],
        latency_sec: 0.31,
      },
      DETECTION_URL
    );

    expect(result).toEqual({
      boxes: [{ label: 'red chair', score: 0.82, bbox: [10, 20, 110, 220] }],
      imageSize: { width: 640, height: 480 },
      latencySec: 0.31,
    });
  });

  it('accepts alternate item keys and a bare list', () => {
    const result = parseDetectionResponse(
      [
        { name: 'lamp', confidence: 0.5, box: [0.1, 0.1, 0.4, 0.6] },
        { text: 'door', xyxy: [1, 2, 3, 4] },
      ],
      DETECTION_URL
    );

    expect(result.boxes).toEqual([
      { label: 'lamp', score: 0.5, bbox: [0.1, 0.1, 0.4, 0.6] },
      { label: 'door', score: null, bbox: [1, 2, 3, 4] },
    ]);
  });

  it('accepts items instead of detections', () => {
    const result = parseDetectionResponse({ items: [{ label: 'cup', bbox: [1, 1, 5, 5] }] }, DETECTION_URL);
    expect(result.boxes).toEqual([{ label: 'cup', score: null, bbox: [1, 1, 5, 5] }]);
  });

  it('drops items without a usable box', () => {
    const result = parseDetectionResponse(
      {
        detections: [
          { label: 'short', bbox: [1, 2, 3] },
          { label: 'missing' },
          'garbage',
          { bbox: [5, 6, 7, 8] },
        ],
      },
      DETECTION_URL
    );

    expect(result.boxes).toEqual([{ label: 'object', score: null, bbox: [5, 6, 7, 8] }]);
  });

  it('treats zero detections as a valid result', () => {
    expect(parseDetectionResponse({ detections: [] }, DETECTION_URL)).toEqual({ boxes: [] });
  });

  it('decodes the annotated image', () => {
    const png = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
    const result = parseDetectionResponse(
      { detections: [], annotated_image_b64: png.toString('base64') },
      DETECTION_URL
    );

    expect(result.annotatedImage?.equals(png)).toBe(true);
  });

  it('raises SchemaError when no detection list is present', () => {
    expect(() => parseDetectionResponse({ image: { width: 1, height: 1 } }, DETECTION_URL)).toThrow(SchemaError);
    expect(() => parseDetectionResponse('nope', DETECTION_URL)).toThrow(SchemaError);
  });
});

describe('DetectionClient', () => {
  it('uploads the frame with prompts and annotate as multipart fields', async () => {
    const fetchMock = stubFetch(Response.json({ detections: [] }));
    const client = new DetectionClient({ url: DETECTION_URL });

    const result = await client.detect(event, ['red chair', 'table'], true);

    expect(result.boxes).toEqual([]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(DETECTION_URL);
    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      expect(form.get('prompts')).toBe('["red chair","table"]');
      expect(form.get('annotate')).toBe('1');
      const image = form.get('image');
      expect(image).toBeInstanceOf(Blob);
      if (image !== null && typeof image !== 'string') {
        expect(image.name).toBe('frame001.jpg');
        expect(image.size).toBe('not really a jpeg'.length);
      }
    }
  });

  it('still calls the service with an empty query list', async () => {
    const fetchMock = stubFetch(Response.json({ detections: [] }));
    const client = new DetectionClient({ url: DETECTION_URL });

    await client.call({ event, queries: [], annotate: false }, new AbortController().signal);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const form = fetchMock.mock.calls[0][1]?.body;
    if (form instanceof FormData) {
      expect(form.get('prompts')).toBe('[]');
      expect(form.get('annotate')).toBe('0');
    }
  });

  it('raises SchemaError on a malformed body', async () => {
    stubFetch(new Response('{"detections": "many"}', { status: 200 }));
    const client = new DetectionClient({ url: DETECTION_URL });

    await expect(client.detect(event, ['chair'], false)).rejects.toBeInstanceOf(SchemaError);
  });

  it('raises LocalError when the frame cannot be read', async () => {
    const fetchMock = stubFetch(Response.json({ detections: [] }));
    const client = new DetectionClient({ url: DETECTION_URL });

    await expect(
      client.detect({ ...event, imagePath: path.join(dir, 'missing.jpg') }, ['chair'], false)
    ).rejects.toBeInstanceOf(LocalError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
