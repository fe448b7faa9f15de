/**
 * String templates over a fixed set of named slots.
 *
 * Templates are compiled once, when their module loads, and compilation
 * checks every `{{slot}}` against the declared slot names. A malformed
 * template therefore fails at startup with a TemplateError instead of
 * producing a broken prompt or message mid-request.
 */

import { TemplateError } from '../errors.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

export interface Template<S extends string> {
  readonly name: string;
  readonly slots: readonly S[];
  render(values: Record<S, string>): string;
}

export interface CompileOptions {
  /** Every declared slot must appear at least once. Default: true. */
  requireAll?: boolean;
}

export function compileTemplate<S extends string>(
  name: string,
  source: string,
  slots: readonly S[],
  options?: CompileOptions
): Template<S> {
  const declared = new Set<string>(slots);
  const used = new Set<string>();

  for (const match of source.matchAll(PLACEHOLDER)) {
    const slot = match[1];
    if (!declared.has(slot)) {
      throw new TemplateError(name, `unknown slot "${slot}"`);
    }
    used.add(slot);
  }

  const leftover = source.replace(PLACEHOLDER, '');
  if (leftover.includes('{{') || leftover.includes('}}')) {
    throw new TemplateError(name, 'unbalanced placeholder braces');
  }

  if (options?.requireAll ?? true) {
    const missing = slots.filter((slot) => !used.has(slot));
    if (missing.length > 0) {
      throw new TemplateError(name, `slot(s) never used: ${missing.join(', ')}`);
    }
  }

  return {
    name,
    slots,
    render(values: Record<S, string>): string {
      return source.replace(PLACEHOLDER, (_whole, slot: string) =>
        isSlot(slot) ? values[slot] : ''
      );
    },
  };

  function isSlot(slot: string): slot is S {
    return declared.has(slot);
  }
}
