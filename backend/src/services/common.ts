import { z } from 'zod';
import { Err, Ok, Page, Result, ServiceErrorCode } from '../models/structures';

export const PAGE_SIZE = 10;

// Result constructors, for uniform error handling
export function err(code: ServiceErrorCode, message: string, details?: string[]): Err {
  return details && details.length
    ? { ok: false, error: { code, message, details } }
    : { ok: false, error: { code, message } };
}

export function ok<T>(data: T): Ok<T> {
  return { ok: true, data };
}

/** Run a zod schema over untrusted input; the first issue becomes the message, all of them the details. */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>> {
  const parsed = schema.safeParse(input ?? {});
  if (parsed.success) return ok(parsed.data);

  const details = parsed.error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return err('VALIDATION_ERROR', parsed.error.issues[0]?.message ?? 'Dados inválidos.', details);
}

export function pageNumber(raw: unknown): number {
  const page = Number.parseInt(String(raw ?? '1'), 10);
  return Number.isFinite(page) && page > 1 ? page : 1;
}

/** Wraps one page of rows; `total` is the row count before LIMIT/OFFSET. */
export function toPage<T>(items: T[], total: number, page: number): Page<T> {
  return {
    items,
    total,
    page,
    pages: Math.max(1, Math.ceil(total / PAGE_SIZE))
  };
}

export function offsetOf(page: number): number {
  return (page - 1) * PAGE_SIZE;
}

// SQLite stores booleans as 0/1
export const flag = (value: number | boolean): boolean => value === 1 || value === true;
export const bit = (value: boolean): number => (value ? 1 : 0);
