import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LocalError } from './errors';
import { writeSidecarResult } from './sidecar';
import type { ResultPayload } from './types';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-sidecar-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

function payload(imagePath: string): ResultPayload {
  return {
    event_id: 'evt-1',
    image_path: imagePath,
    image_name: path.basename(imagePath),
    captured_at: '2026-01-01T00:00:00.000Z',
    pose: null,
    caption: 'a red chair',
    objects: ['red chair'],
    detections: [{ label: 'red chair', score: 0.82, bbox: [1, 2, 3, 4] }],
    image_size: { width: 64, height: 48 },
    artifact_path: imagePath.replace('.jpg', '_ann.jpg'),
    processed_at: '2026-01-01T00:00:05.000Z',
  };
}

async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(file, 'utf-8'));
}

describe('writeSidecarResult', () => {
  it('creates the sidecar beside the frame', async () => {
    const imagePath = path.join(dir, 'frame001.jpg');

    const file = await writeSidecarResult(imagePath, payload(imagePath));

    expect(file).toBe(path.join(dir, 'frame001.json'));
    expect(await readJson(file)).toEqual({ relay: payload(imagePath) });
  });

  it('keeps fields written by the capture stage', async () => {
    const imagePath = path.join(dir, 'frame001.jpg');
    await fs.writeFile(path.join(dir, 'frame001.json'), JSON.stringify({ pose: { x: 1, y: 2 }, relay: { stale: true } }));

    await writeSidecarResult(imagePath, payload(imagePath));

    expect(await readJson(path.join(dir, 'frame001.json'))).toEqual({
      pose: { x: 1, y: 2 },
      relay: payload(imagePath),
    });
  });

  it('replaces a sidecar that is not valid JSON', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const imagePath = path.join(dir, 'frame001.jpg');
    await fs.writeFile(path.join(dir, 'frame001.json'), '{ truncated');

    await writeSidecarResult(imagePath, payload(imagePath));

    expect(await readJson(path.join(dir, 'frame001.json'))).toEqual({ relay: payload(imagePath) });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('raises LocalError when the directory is gone', async () => {
    const imagePath = path.join(dir, 'missing', 'frame001.jpg');

    await expect(writeSidecarResult(imagePath, payload(imagePath))).rejects.toBeInstanceOf(LocalError);
  });
});
