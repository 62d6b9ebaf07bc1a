/**
 * Caption -> object list, via the prompt extraction service (`POST /prompts`).
 */
import { z } from 'zod';
import { SchemaError } from './errors';
import type { RemoteService } from './forwarder';
import { parseJsonBody, request } from './http';
import type { Caption, ObjectQuery } from './types';

// ==========================================
// SCHEMAS
// ==========================================

// The deployed prompt server answers `{"prompts": [...]}`; `objects` is the documented field.
const PromptResponseSchema = z
  .object({
    objects: z.array(z.string()).optional(),
    prompts: z.array(z.string()).optional(),
  })
  .transform((body, ctx) => {
    const list = body.objects ?? body.prompts;
    if (!list) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "missing 'objects' list" });
      return z.NEVER;
    }
    return list;
  });

// ==========================================
// HELPERS
// ==========================================

/** Trim, drop blanks, keep the first occurrence of each prompt. */
export function dedupePrompts(prompts: string[]): ObjectQuery {
  const seen = new Set<string>();
  const out: ObjectQuery = [];
  for (const raw of prompts) {
    const prompt = raw.trim();
    if (!prompt || seen.has(prompt)) continue;
    seen.add(prompt);
    out.push(prompt);
  }
  return out;
}

// ==========================================
// CLIENT
// ==========================================

export type PromptClientConfig = {
  url: string;
};

export class PromptExtractionClient implements RemoteService<Caption, ObjectQuery> {
  readonly name = 'prompts';

  constructor(private config: PromptClientConfig) {}

  call(caption: Caption, signal: AbortSignal): Promise<ObjectQuery> {
    return this.extractObjects(caption, signal);
  }

  async extractObjects(caption: Caption, signal?: AbortSignal): Promise<ObjectQuery> {
    const text = caption.text.trim();
    if (!text) return [];

    const res = await request({
      url: this.config.url,
      json: { caption: text },
      signal,
    });

    const parsed = PromptResponseSchema.safeParse(parseJsonBody(res.text, this.config.url));
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join('; ');
      throw new SchemaError(`unexpected response from ${this.config.url}: ${detail}`);
    }
    return dedupePrompts(parsed.data);
  }
}
