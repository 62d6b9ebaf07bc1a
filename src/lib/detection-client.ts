/**
 * Open-vocabulary detection via the detection service (multipart `POST /infer`).
 */
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { LocalError, SchemaError } from './errors';
import type { RemoteService } from './forwarder';
import { parseJsonBody, request } from './http';
import type { BBox, CaptureEvent, DetectionBox, DetectionResult, ObjectQuery } from './types';

// ==========================================
// SCHEMAS
// ==========================================

const RawDetectionSchema = z.object({
  label: z.string().optional(),
  name: z.string().optional(),
  text: z.string().optional(),
  score: z.number().nullable().optional(),
  confidence: z.number().nullable().optional(),
  bbox: z.array(z.number()).optional(),
  box: z.array(z.number()).optional(),
  xyxy: z.array(z.number()).optional(),
});

const DetectionResponseSchema = z
  .object({
    detections: z.array(z.unknown()).optional(),
    items: z.array(z.unknown()).optional(),
    image: z.object({ width: z.number().int().positive(), height: z.number().int().positive() }).optional(),
    latency_sec: z.number().optional(),
    annotated_image_b64: z.string().optional(),
  })
  .refine((body) => body.detections !== undefined || body.items !== undefined, {
    message: "missing 'detections' list",
  });

type DetectionResponse = z.infer<typeof DetectionResponseSchema>;

// ==========================================
// HELPERS
// ==========================================

function toBox(raw: unknown): DetectionBox | null {
  const parsed = RawDetectionSchema.safeParse(raw);
  if (!parsed.success) return null;
  const d = parsed.data;
  const coords = d.bbox ?? d.box ?? d.xyxy;
  if (!coords || coords.length !== 4 || !coords.every(Number.isFinite)) return null;
  const bbox: BBox = [coords[0], coords[1], coords[2], coords[3]];
  const label = (d.label ?? d.name ?? d.text ?? 'object').trim() || 'object';
  const score = d.score ?? d.confidence ?? null;
  return { label, score, bbox };
}

/** Normalize a detection service body into a DetectionResult. */
export function parseDetectionResponse(body: unknown, url: string): DetectionResult {
  let response: DetectionResponse;
  if (Array.isArray(body)) {
    response = { detections: body };
  } else {
    const parsed = DetectionResponseSchema.safeParse(body);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join('; ');
      throw new SchemaError(`unexpected response from ${url}: ${detail}`);
    }
    response = parsed.data;
  }

  const rawItems = response.detections ?? response.items ?? [];
  const boxes: DetectionBox[] = [];
  for (const raw of rawItems) {
    const box = toBox(raw);
    if (box) boxes.push(box);
  }

  const result: DetectionResult = { boxes };
  if (response.image) result.imageSize = response.image;
  if (response.latency_sec !== undefined) result.latencySec = response.latency_sec;
  if (response.annotated_image_b64) {
    result.annotatedImage = Buffer.from(response.annotated_image_b64, 'base64');
  }
  return result;
}

// ==========================================
// CLIENT
// ==========================================

export type DetectionRequest = {
  event: CaptureEvent;
  queries: ObjectQuery;
  annotate: boolean;
};

export type DetectionClientConfig = {
  url: string;
};

export class DetectionClient implements RemoteService<DetectionRequest, DetectionResult> {
  readonly name = 'detection';

  constructor(private config: DetectionClientConfig) {}

  call(req: DetectionRequest, signal: AbortSignal): Promise<DetectionResult> {
    return this.detect(req.event, req.queries, req.annotate, signal);
  }

  /**
   * An empty query list is still sent; the service decides what "detect
   * nothing" means.
   */
  async detect(
    event: CaptureEvent,
    queries: ObjectQuery,
    annotate: boolean,
    signal?: AbortSignal
  ): Promise<DetectionResult> {
    let image: Buffer;
    try {
      image = await fs.readFile(event.imagePath);
    } catch (error) {
      throw new LocalError(`cannot read image ${event.imagePath}`, { cause: error });
    }

    const form = new FormData();
    form.append('image', new Blob([new Uint8Array(image)]), path.basename(event.imagePath));
    form.append('prompts', JSON.stringify(queries));
    form.append('annotate', annotate ? '1' : '0');

    const res = await request({ url: this.config.url, form, signal });
    return parseDetectionResponse(parseJsonBody(res.text, this.config.url), this.config.url);
  }
}
