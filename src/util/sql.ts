// src/util/sql.ts
// What: SQL helpers for vectors, scoring and JSONB metadata.
// How: vectorToParam formats an array for ::vector casting; clampSimilarity converts distance to [0,1];
//      toStoredMetadata keeps the scalar fields of a JSONB object.

import type { StoredMetadata } from '../models/types.js';

export function vectorToParam(v: number[]): string {
  // Postgres vector literal: [0.1, 0.2, ...]
  return `[${v.join(',')}]`;
}

export function clampSimilarity(distance: number): number {
  const sim = 1 - distance;
  if (sim < 0) return 0;
  if (sim > 1) return 1;
  return sim;
}

export function toStoredMetadata(value: unknown): StoredMetadata {
  const out: StoredMetadata = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return out;
  for (const [key, v] of Object.entries(value)) {
    if (v === null || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') {
      out[key] = v;
    }
  }
  return out;
}
