/**
 * Typed view of the merged document: one JSON object whose component keys
 * hold raw text. Keys the engine does not track (added by other tools) are
 * carried in `extras` and written back untouched.
 */

import { z } from 'zod';
import type { ComponentKey } from '@ctxmirror/core';

// ─── Types ────────────────────────────────────────────────────────

export interface MergedDocument {
  /** Only components present in the file; a missing key is not the same as '' */
  components: Record<ComponentKey, string>;
  extras: Record<string, unknown>;
}

export type ParseResult =
  | { ok: true; document: MergedDocument }
  | { ok: false; reason: string };

const documentSchema = z.record(z.string(), z.unknown());

// ─── Parsing ──────────────────────────────────────────────────────

/**
 * Parse raw file content. Fails on invalid JSON, a non-object top level, or a
 * tracked component whose value is not a string.
 */
export function parseMergedDocument(
  raw: string,
  componentKeys: readonly ComponentKey[]
): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: `invalid JSON: ${message}` };
  }

  if (Array.isArray(json)) {
    return { ok: false, reason: 'expected a JSON object, found an array' };
  }
  const parsed = documentSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: `expected a JSON object, found ${json === null ? 'null' : typeof json}` };
  }

  const components: Record<ComponentKey, string> = {};
  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (componentKeys.includes(key)) {
      if (typeof value !== 'string') {
        return { ok: false, reason: `component "${key}" is not a string` };
      }
      components[key] = value;
    } else {
      extras[key] = value;
    }
  }

  return { ok: true, document: { components, extras } };
}

/**
 * Serialise with tracked components first (in tracking order), then extras in
 * their original order. Two-space indentation, no trailing newline.
 */
export function serializeMergedDocument(
  document: MergedDocument,
  componentKeys: readonly ComponentKey[]
): string {
  const out: Record<string, unknown> = {};
  for (const key of componentKeys) {
    if (Object.hasOwn(document.components, key)) {
      out[key] = document.components[key];
    }
  }
  for (const [key, value] of Object.entries(document.extras)) {
    if (!Object.hasOwn(out, key)) {
      out[key] = value;
    }
  }
  return JSON.stringify(out, null, 2);
}

// ─── Helpers ──────────────────────────────────────────────────────

export function emptyDocument(): MergedDocument {
  return { components: {}, extras: {} };
}

export function cloneDocument(document: MergedDocument): MergedDocument {
  return {
    components: { ...document.components },
    extras: { ...document.extras },
  };
}

/** Copy of `document` with one component replaced */
export function withComponent(
  document: MergedDocument,
  componentKey: ComponentKey,
  content: string
): MergedDocument {
  return {
    components: { ...document.components, [componentKey]: content },
    extras: { ...document.extras },
  };
}

/**
 * Components present in `next` whose value differs from `previous`.
 * Keys absent from `next` are not reported: removing a key is not an edit.
 */
export function diffComponents(
  previous: MergedDocument,
  next: MergedDocument,
  componentKeys: readonly ComponentKey[]
): ComponentKey[] {
  return componentKeys.filter(
    (key) =>
      Object.hasOwn(next.components, key) &&
      next.components[key] !== previous.components[key]
  );
}
