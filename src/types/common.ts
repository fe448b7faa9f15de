/**
 * Request body schema used by the validateBody middleware.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  maxLength?: number;
  min?: number;
  max?: number;
  enum?: readonly string[];
  /** Strings only: must parse as a date. */
  date?: boolean;
}

export type BodySchema = Record<string, FieldSchema>;

/** Outcome of an operation that reports expected failures as values. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
