// src/planner-core/coercion.ts
// Lenient readers for form values. Nothing here throws: bad input falls back.

import type { FinancialInputSnapshot } from '@shared/types';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const TRUTHY = new Set(['yes', 'true', '1']);

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

/**
 * Returns the value of the first alias present in the snapshot with a
 * non-blank value, or `fallback` when none is.
 */
export function pickAlias(
  snapshot: FinancialInputSnapshot,
  aliases: readonly string[],
  fallback: unknown = 0,
): unknown {
  for (const name of aliases) {
    if (Object.hasOwn(snapshot, name) && !isBlank(snapshot[name])) {
      return snapshot[name];
    }
  }
  return fallback;
}

/**
 * Whole-dollar reading of a form value. Accepts numbers, booleans and text
 * such as "$1,250.75"; fractions are truncated toward zero.
 */
export function toInt(value: unknown, fallback = 0): number {
  if (isBlank(value)) return fallback;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : fallback;
  }

  if (typeof value === 'boolean') return value ? 1 : 0;

  if (typeof value === 'string') {
    const cleaned = value.replace(/[$,]/g, '').trim();
    if (cleaned === '' || !DECIMAL.test(cleaned)) return fallback;
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
  }

  return fallback;
}

export function toBool(value: unknown): boolean {
  return TRUTHY.has(String(value).toLowerCase());
}
