import { createHash } from 'crypto';
import fs from 'fs/promises';
import { z } from 'zod';
import { resolveInsideRoot } from './captures';
import type { CaptureEvent, Pose } from './types';

export const InboundEventSchema = z.object({
  image_path: z.string().trim().min(1, 'image_path is required'),
  caption: z.string({ required_error: 'caption is required' }),
  event_id: z
    .string()
    .trim()
    .regex(/^[\w.:-]{1,128}$/, 'event_id may only contain letters, digits, _ . : -')
    .optional(),
  captured_at: z.string().datetime({ offset: true }).optional(),
  pose: z
    .object({
      x: z.number().optional(),
      y: z.number().optional(),
      z: z.number().optional(),
      yaw: z.number().optional(),
    })
    .optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type InboundEvent = z.infer<typeof InboundEventSchema>;

export class EventRejectedError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'EventRejectedError';
    this.status = status;
  }
}

/** Stable id for a frame: the same file always maps to the same id. */
export function eventIdFor(imagePath: string): string {
  return createHash('sha1').update(imagePath).digest('hex').slice(0, 16);
}

/**
 * Turn an inbound notification into a frozen CaptureEvent. The image must live
 * under `capturesRoot` and exist.
 */
export async function createCaptureEvent(capturesRoot: string, input: InboundEvent): Promise<CaptureEvent> {
  const imagePath = resolveInsideRoot(capturesRoot, input.image_path);
  if (!imagePath) {
    throw new EventRejectedError(400, `image_path must be inside the captures root: ${input.image_path}`);
  }

  const stat = await fs.stat(imagePath).catch(() => null);
  if (!stat || !stat.isFile()) {
    throw new EventRejectedError(404, `image not found: ${input.image_path}`);
  }

  const pose: Pose | undefined = input.pose ? { ...input.pose } : undefined;
  const event: CaptureEvent = {
    id: input.event_id ?? eventIdFor(imagePath),
    imagePath,
    capturedAt: input.captured_at ?? stat.mtime.toISOString(),
    caption: input.caption,
    ...(pose ? { pose: Object.freeze(pose) } : {}),
    ...(input.metadata ? { metadata: Object.freeze({ ...input.metadata }) } : {}),
  };
  return Object.freeze(event);
}
