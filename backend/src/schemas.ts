// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for the form and path parameters
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { isIsoDate, MAX_ID } from './services/helpers.ts';
import { ValidationError } from './shared/errors.ts';

// ── Shared fields ──

const EntityId = z.coerce.number().int().positive().max(MAX_ID);

const IsoDate = z.string().trim().refine(isIsoDate, 'Expected a YYYY-MM-DD calendar date');

const CHECKED = new Set(['on', 'true', '1', 'yes']);

/** HTML checkbox: present with a truthy value → true, anything else → false. */
const Checkbox = z.unknown().transform((v) => {
  if (typeof v === 'boolean') return v;
  return typeof v === 'string' && CHECKED.has(v.trim().toLowerCase());
});

// ── POST /create ──
// volume_{id} / cost_{id} pass through untouched; line-items.ts reads them.

export const OperationCreateSchema = z.object({
  ship_id: EntityId,
  port_id: EntityId,
  contractor_id: EntityId,
  date: IsoDate,
}).passthrough();

export type OperationCreateInput = z.infer<typeof OperationCreateSchema>;

// ── POST /edit/:id ──

export const OperationEditSchema = OperationCreateSchema.extend({
  has_documents: Checkbox,
});

export type OperationEditInput = z.infer<typeof OperationEditSchema>;

// ── /operation/:id, /edit/:id, /delete/:id ──

export const IdParamSchema = z.object({
  id: z.string().regex(/^\d+$/).transform(Number).pipe(z.number().int().positive().max(MAX_ID)),
});

/** Flatten zod issues into "field: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
}

/** Parse or throw a ValidationError carrying the flattened issues. */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) throw new ValidationError(formatIssues(result.error));
  return result.data;
}

/** Positive integer path id, or null for anything else. */
export function parseIdParam(params: unknown): number | null {
  const result = IdParamSchema.safeParse(params);
  return result.success ? result.data.id : null;
}
