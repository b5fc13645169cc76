/**
 * Typed parse for model-emitted JSON: strips markdown fences, tolerates
 * single-quoted objects, validates against a zod schema. Never throws.
 */
import type { z } from 'zod';
import { logger } from '@/services/logger';

export type ParseResult<T> = { ok: true; data: T } | { ok: false; reason: string };

export function stripCodeFences(raw: string): string {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

function parseLoose(txt: string): unknown {
  try {
    return JSON.parse(txt);
  } catch {
    // single-quoted objects are common from small models
    return JSON.parse(txt.replace(/'/g, '"'));
  }
}

export function parseModelJson<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
  context: string,
): ParseResult<z.infer<S>> {
  const txt = stripCodeFences(raw);
  if (!txt) return { ok: false, reason: 'empty' };

  let value: unknown;
  try {
    value = parseLoose(txt);
  } catch {
    logger.warn('parseModelJson:parse_error', { context, raw: txt.slice(0, 300) });
    return { ok: false, reason: 'invalid_json' };
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    logger.warn('parseModelJson:schema_mismatch', {
      context,
      issues: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
    return { ok: false, reason: 'schema_mismatch' };
  }
  return { ok: true, data: result.data };
}
