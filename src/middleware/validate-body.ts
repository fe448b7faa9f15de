/**
 * Body validation middleware.
 * Parses the JSON body, checks it against a schema and hands the parsed
 * object to the handler through `ctx.body`.
 * Returns 400 with field-level errors if validation fails.
 */

import { ValidationError } from '../errors.js';
import type { BodySchema, FieldSchema } from '../types/common.js';
import { appErrorResponse } from './error-handler.js';
import type { Handler, Middleware } from './pipeline.js';

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      let parsed: unknown;

      try {
        parsed = await req.json();
      } catch {
        return appErrorResponse(new ValidationError('Request body must be valid JSON'));
      }

      if (!isRecord(parsed)) {
        return appErrorResponse(new ValidationError('Request body must be a JSON object'));
      }

      const errors = validateFields(parsed, schema);
      if (errors.length > 0) {
        return appErrorResponse(new ValidationError(errors.join('; '), { fields: errors }));
      }

      ctx.body = parsed;
      return next(req, ctx);
    };
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Typed readers for handlers behind validateBody ──

/** The validated body; throws if the handler runs without validateBody. */
export function requireBody(body: Record<string, unknown> | null): Record<string, unknown> {
  if (!body) throw new ValidationError('Request body is required');
  return body;
}

export function readString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  return value;
}

export function readOptionalString(
  body: Record<string, unknown>,
  field: string
): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  return value;
}

// ── Schema checks ──

function validateFields(
  body: Record<string, unknown>,
  schema: BodySchema
): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    if (fieldSchema.required && (value === undefined || value === null)) {
      errors.push(`${field} is required`);
      continue;
    }

    if (value === undefined || value === null) {
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

function checkType(
  field: string,
  value: unknown,
  schema: FieldSchema
): string | null {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') return `${field} must be a string`;
      break;
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value)) return `${field} must be a number`;
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return `${field} must be a boolean`;
      break;
    case 'array':
      if (!Array.isArray(value)) return `${field} must be an array`;
      break;
    case 'object':
      if (!isRecord(value)) return `${field} must be an object`;
      break;
  }
  return null;
}

function checkConstraints(
  field: string,
  value: unknown,
  schema: FieldSchema
): string[] {
  const errors: string[] = [];

  if (typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
    if (schema.date && Number.isNaN(Date.parse(value))) {
      errors.push(`${field} must be an ISO-8601 date`);
    }
  }

  if (typeof value === 'number') {
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  if (Array.isArray(value) && schema.maxLength !== undefined && value.length > schema.maxLength) {
    errors.push(`${field} must have at most ${schema.maxLength} entries`);
  }

  return errors;
}
