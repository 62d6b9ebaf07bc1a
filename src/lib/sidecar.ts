import fs from 'fs/promises';
import { sidecarPathFor, writeFileAtomic } from './captures';
import { LocalError } from './errors';
import type { ResultPayload } from './types';

export const SIDECAR_KEY = 'relay';

async function readSidecar(file: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch {
    // No sidecar yet
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    console.warn(`[sidecar] ${file} is not valid JSON; replacing it`);
  }
  return {};
}

/**
 * Merge the relay result into the frame's sidecar JSON under `relay`, keeping
 * whatever the capture stage already wrote there.
 */
export async function writeSidecarResult(imagePath: string, payload: ResultPayload): Promise<string> {
  const file = sidecarPathFor(imagePath);
  const existing = await readSidecar(file);
  const merged = { ...existing, [SIDECAR_KEY]: payload };
  try {
    await writeFileAtomic(file, JSON.stringify(merged, null, 2));
  } catch (error) {
    throw new LocalError(`cannot write sidecar ${file}`, { cause: error });
  }
  return file;
}
