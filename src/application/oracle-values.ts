import { z } from 'zod';
import { LABELS, LEVELS } from '../domain/index.js';

/**
 * Zod parsers for values coming back from the judgment oracle.
 *
 * Oracle output is never trusted past these schemas: anything that does
 * not parse is routed to a skipped list by the caller.
 */

/** Non-negative integer, or a string of digits. */
export const intLike = z.union([
  z.number().int().min(0),
  z.string().trim().regex(/^\d+$/).transform(Number),
]);

const lowerTrimmed = z.string().trim().toLowerCase();

export const labelValue = lowerTrimmed.pipe(z.enum(LABELS));
export const levelValue = lowerTrimmed.pipe(z.enum(LEVELS));

/** Confidence clamped into [0, 1]; absent or non-numeric → 0. */
export const confidenceValue = z
  .union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)])
  .optional()
  .catch(undefined)
  .transform((value) => (value === undefined || !Number.isFinite(value) ? 0 : Math.min(1, Math.max(0, value))));

/** Object with string keys; arrays and primitives are rejected. */
export const objectValue = z.record(z.string(), z.unknown());

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Splits a list into consecutive chunks of at most `size` items. */
export function chunked<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}

/**
 * Indexes the `items` list of an oracle response by `idx`, keeping only
 * object items whose index was part of the submitted batch. The first
 * item for an index wins.
 */
export function itemsByIdx(
  data: Readonly<Record<string, unknown>>,
  submitted: ReadonlySet<number>,
): { byIdx: Map<number, Record<string, unknown>>; skipped: { idx: number | null; reason: string }[] } {
  const byIdx = new Map<number, Record<string, unknown>>();
  const skipped: { idx: number | null; reason: string }[] = [];

  const items = data['items'];
  if (!Array.isArray(items)) {
    skipped.push({ idx: null, reason: 'response has no "items" list' });
    return { byIdx, skipped };
  }

  for (const item of items) {
    if (!isPlainObject(item)) {
      skipped.push({ idx: null, reason: 'item is not an object' });
      continue;
    }
    const idx = intLike.safeParse(item['idx']);
    if (!idx.success) {
      skipped.push({ idx: null, reason: 'item has no idx' });
      continue;
    }
    if (!submitted.has(idx.data)) {
      skipped.push({ idx: idx.data, reason: 'idx was not part of the submitted batch' });
      continue;
    }
    if (!byIdx.has(idx.data)) byIdx.set(idx.data, item);
  }

  return { byIdx, skipped };
}
