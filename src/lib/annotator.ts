import sharp from 'sharp';
import path from 'path';
import { annotatedPathFor, writeFileAtomic, type WriteIO } from './captures';
import { LocalError } from './errors';
import type { AnnotatedArtifact, BBox, CaptureEvent, DetectionBox, DetectionResult } from './types';

// Generate a consistent color from any label using a hash
export function labelColor(label: string): string {
  let hash = 0;
  for (let i = 0; i < label.length; i++) {
    hash = label.charCodeAt(i) + ((hash << 5) - hash);
  }
  const h = Math.abs(hash) % 360;
  const s = 0.7;
  const l = 0.5;
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = l - c / 2;
  let r = 0, g = 0, b = 0;
  if (h < 60) { r = c; g = x; }
  else if (h < 120) { r = x; g = c; }
  else if (h < 180) { g = c; b = x; }
  else if (h < 240) { g = x; b = c; }
  else if (h < 300) { r = x; b = c; }
  else { r = c; b = x; }
  const toHex = (v: number) => Math.round((v + m) * 255).toString(16).padStart(2, '0');
  return `#${toHex(r)}${toHex(g)}${toHex(b)}`;
}

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

/**
 * Scale a box to pixels (when all four values are in [0, 1]), order its corners,
 * and clamp it to the image. Returns null for boxes with no area.
 */
export function toPixelBox(bbox: BBox, width: number, height: number): BBox | null {
  let [x1, y1, x2, y2] = bbox;
  if ([x1, y1, x2, y2].every((v) => v >= 0 && v <= 1)) {
    x1 *= width;
    x2 *= width;
    y1 *= height;
    y2 *= height;
  }
  const xmin = clamp(Math.round(Math.min(x1, x2)), 0, width - 1);
  const xmax = clamp(Math.round(Math.max(x1, x2)), 0, width - 1);
  const ymin = clamp(Math.round(Math.min(y1, y2)), 0, height - 1);
  const ymax = clamp(Math.round(Math.max(y1, y2)), 0, height - 1);
  if (xmax <= xmin || ymax <= ymin) return null;
  return [xmin, ymin, xmax, ymax];
}

export function boxCaption(box: DetectionBox): string {
  return box.score === null ? box.label : `${box.label} ${box.score.toFixed(2)}`;
}

function escapeXml(text: string) {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function buildSvg(width: number, height: number, boxes: DetectionBox[]): { svg: string; drawn: number } {
  const thickness = Math.max(2, Math.round(Math.min(width, height) / 150));
  const fontSize = Math.max(12, Math.round(Math.min(width, height) / 30));
  let drawn = 0;

  const elements = boxes
    .map((box) => {
      const px = toPixelBox(box.bbox, width, height);
      if (!px) return '';
      drawn++;
      const [xmin, ymin, xmax, ymax] = px;
      const color = labelColor(box.label);
      const text = escapeXml(boxCaption(box));
      const approxTextWidth = text.length * fontSize * 0.6 + 8;
      const approxTextHeight = fontSize + 8;
      const bgX = clamp(xmin, 0, Math.max(0, width - approxTextWidth));
      const bgY = ymin - approxTextHeight >= 0 ? ymin - approxTextHeight : ymin;

      return `
  <rect x="${xmin}" y="${ymin}" width="${xmax - xmin}" height="${ymax - ymin}" fill="none" stroke="${color}" stroke-width="${thickness}" />
  <rect x="${bgX.toFixed(1)}" y="${bgY.toFixed(1)}" width="${approxTextWidth.toFixed(1)}" height="${approxTextHeight.toFixed(1)}" fill="${color}" />
  <text x="${(bgX + 4).toFixed(1)}" y="${(bgY + 4).toFixed(1)}" font-size="${fontSize}" font-family="system-ui, -apple-system, Segoe UI, sans-serif" fill="#ffffff" dominant-baseline="hanging">${text}</text>
`;
    })
    .filter(Boolean)
    .join('\n');

  const svg = `
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
${elements}
</svg>
`.trim();

  return { svg, drawn };
}

function applyOutputFormat(pipeline: sharp.Sharp, outputPath: string): sharp.Sharp {
  const ext = path.extname(outputPath).toLowerCase();
  if (ext === '.jpg' || ext === '.jpeg') return pipeline.jpeg({ quality: 92 });
  if (ext === '.webp') return pipeline.webp();
  return pipeline.png();
}

// ==========================================
// WRITER
// ==========================================

export type AnnotationWriterOptions = {
  /** Prefer the image the detection service annotated, when it sent one */
  preferServiceImage?: boolean;
  io?: WriteIO;
};

export class AnnotationWriter {
  constructor(private options: AnnotationWriterOptions = {}) {}

  /**
   * Draw the detections over the captured frame and store the result next to it.
   * With no detections the frame is re-encoded unchanged, so every processed
   * event has an artifact.
   */
  async annotate(event: CaptureEvent, detection: DetectionResult): Promise<AnnotatedArtifact> {
    const outputPath = annotatedPathFor(event.imagePath);

    try {
      if (this.options.preferServiceImage && detection.annotatedImage) {
        return await this.writeServiceImage(outputPath, detection.annotatedImage, detection.boxes.length);
      }

      const base = sharp(event.imagePath);
      const metadata = await base.metadata();
      if (!metadata.width || !metadata.height) {
        throw new LocalError(`unable to read image dimensions of ${event.imagePath}`);
      }

      const { svg, drawn } = buildSvg(metadata.width, metadata.height, detection.boxes);
      const pipeline = drawn > 0 ? base.composite([{ input: Buffer.from(svg), top: 0, left: 0 }]) : base;
      const buffer = await applyOutputFormat(pipeline, outputPath).toBuffer();

      await writeFileAtomic(outputPath, buffer, this.options.io);
      return {
        path: outputPath,
        width: metadata.width,
        height: metadata.height,
        boxCount: drawn,
        source: 'local',
      };
    } catch (error) {
      if (error instanceof LocalError) throw error;
      throw new LocalError(`annotation failed for ${event.imagePath}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }

  private async writeServiceImage(outputPath: string, annotated: Buffer, boxCount: number): Promise<AnnotatedArtifact> {
    const image = sharp(annotated);
    const metadata = await image.metadata();
    if (!metadata.width || !metadata.height) {
      throw new LocalError('annotated image from detection service has no dimensions');
    }
    const buffer = await applyOutputFormat(image, outputPath).toBuffer();
    await writeFileAtomic(outputPath, buffer, this.options.io);
    return {
      path: outputPath,
      width: metadata.width,
      height: metadata.height,
      boxCount,
      source: 'service',
    };
  }
}
