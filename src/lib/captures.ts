import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';

// Layout of the captures directory:
//   <root>/<run>/<frame>.jpg        - captured frame (never modified here)
//   <root>/<run>/<frame>.json       - sidecar written by the capture stage, extended here
//   <root>/<run>/<frame>_ann.jpg    - annotated artifact written here
// Older deployments kept artifacts in a sibling `<run>_ann/` folder; those are skipped too.

const IMAGE_RE = /\.(jpe?g|png)$/i;
const ANN_RE = /_ann\.(jpe?g|png)$/i;

export function isImageFile(name: string): boolean {
  return IMAGE_RE.test(name) && !ANN_RE.test(name) && !name.startsWith('.');
}

export function annotatedPathFor(imagePath: string): string {
  const ext = path.extname(imagePath);
  const base = path.basename(imagePath, ext).replace(/_ann$/i, '');
  return path.join(path.dirname(imagePath), `${base}_ann${ext}`);
}

export function sidecarPathFor(imagePath: string): string {
  const ext = path.extname(imagePath);
  return path.join(path.dirname(imagePath), `${path.basename(imagePath, ext)}.json`);
}

/**
 * Resolve a caller-supplied image path against the captures root. Returns null
 * when the result would escape the root.
 */
export function resolveInsideRoot(root: string, imagePath: string): string | null {
  const absRoot = path.resolve(root);
  const resolved = path.resolve(absRoot, imagePath);
  const rel = path.relative(absRoot, resolved);
  if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) return null;
  return resolved;
}

/** Most recently modified captured frame under `root`, or null when there is none. */
export async function findLatestImage(root: string): Promise<string | null> {
  const state: { latest: { file: string; mtimeMs: number } | null } = { latest: null };

  async function walk(dir: string) {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      // Directory vanished mid-walk or is unreadable
      return;
    }
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (/_ann$/i.test(entry.name)) continue;
        await walk(full);
      } else if (entry.isFile() && isImageFile(entry.name)) {
        const stat = await fs.stat(full).catch(() => null);
        const current = state.latest;
        if (stat && (!current || stat.mtimeMs > current.mtimeMs)) {
          state.latest = { file: full, mtimeMs: stat.mtimeMs };
        }
      }
    }
  }

  await walk(path.resolve(root));
  return state.latest ? state.latest.file : null;
}

// ==========================================
// ATOMIC WRITES
// ==========================================

export type WriteIO = {
  writeFile: (file: string, data: Buffer | string) => Promise<void>;
  rename: (from: string, to: string) => Promise<void>;
  unlink: (file: string) => Promise<void>;
};

const nodeIO: WriteIO = {
  writeFile: (file, data) => fs.writeFile(file, data),
  rename: (from, to) => fs.rename(from, to),
  unlink: (file) => fs.unlink(file),
};

export function tempPathFor(target: string): string {
  const ext = path.extname(target);
  const base = path.basename(target, ext);
  const suffix = `${process.pid}-${randomBytes(4).toString('hex')}`;
  return path.join(path.dirname(target), `.${base}.${suffix}.tmp${ext}`);
}

/**
 * Write to a hidden temp file beside `target`, then rename it into place.
 * Readers of the directory see either no file or the complete file.
 */
export async function writeFileAtomic(
  target: string,
  data: Buffer | string,
  io: WriteIO = nodeIO
): Promise<void> {
  const tmp = tempPathFor(target);
  try {
    await io.writeFile(tmp, data);
    await io.rename(tmp, target);
  } catch (error) {
    await io.unlink(tmp).catch((cleanupError: unknown) => {
      if (!isMissingFile(cleanupError)) {
        console.warn(`[captures] could not remove temp file ${tmp}: ${String(cleanupError)}`);
      }
    });
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
