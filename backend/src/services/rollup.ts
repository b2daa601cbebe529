/**
 * rollup.ts — Per-operation cost rollup
 *
 * The list view and the detail view both total an operation through here.
 */
import type { LineItem } from '../types.ts';

export function rollupCost(lineItems: readonly Pick<LineItem, 'cost'>[]): number {
  return lineItems.reduce((sum, item) => sum + item.cost, 0);
}
