/**
 * line-items.ts — Per-substance form fields
 *
 * Create/edit forms carry `volume_{pollutantId}` and `cost_{pollutantId}`
 * for every known substance. The field list is derived from the current
 * pollutant table, never hardcoded.
 */
import { firstString, parseAmount } from './helpers.ts';
import type { LineItemMap, Lookup } from '../types.ts';

export interface SkippedLineItem {
  pollutantId: number;
  field: string;
  value: string;
}

export interface ParsedLineItems {
  items: LineItemMap;
  skipped: SkippedLineItem[];
}

type FieldValue = { ok: true; amount: number } | { ok: false; value: string };

function readAmount(body: Readonly<Record<string, unknown>>, field: string): FieldValue {
  const raw = body[field];
  if (raw === undefined || raw === null) return { ok: true, amount: 0 };
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw >= 0 ? { ok: true, amount: raw } : { ok: false, value: String(raw) };
  }
  const text = firstString(raw);
  if (text === undefined) return { ok: false, value: JSON.stringify(raw) };
  if (text.trim() === '') return { ok: true, amount: 0 };
  const amount = parseAmount(text);
  return amount === null ? { ok: false, value: text } : { ok: true, amount };
}

/**
 * Build the substance → amounts map from a form body.
 * A field that does not parse skips that substance only; all-zero pairs are dropped.
 */
export function parseLineItems(
  body: Readonly<Record<string, unknown>>,
  pollutants: readonly Lookup[],
): ParsedLineItems {
  const items: LineItemMap = new Map();
  const skipped: SkippedLineItem[] = [];

  for (const { id } of pollutants) {
    const volume = readAmount(body, `volume_${id}`);
    const cost = readAmount(body, `cost_${id}`);

    if (!volume.ok) {
      skipped.push({ pollutantId: id, field: `volume_${id}`, value: volume.value });
      continue;
    }
    if (!cost.ok) {
      skipped.push({ pollutantId: id, field: `cost_${id}`, value: cost.value });
      continue;
    }
    if (volume.amount > 0 || cost.amount > 0) {
      items.set(id, { volume: volume.amount, cost: cost.amount });
    }
  }

  return { items, skipped };
}
