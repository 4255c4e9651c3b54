/**
 * Dot-path addressing over profile documents
 *
 * Paths are dot-separated keys ("inventory.weapons"). Arrays are entered by
 * 1-based position ("weapons.1") for reads and writes alike; a write may only
 * replace an existing element. Two sentinels are recognised as the last
 * segment of a set: `++` appends to the array at the parent path and `--`
 * removes the element at the given 1-based position.
 *
 * Every helper reports failure through its return value and never throws.
 */

import { isDeepStrictEqual } from 'util';
import type { JsonObject, JsonValue } from './types';

export const APPEND_SEGMENT = '++';
export const REMOVE_SEGMENT = '--';

const FORBIDDEN_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Split a path into segments, or undefined if malformed
 */
export function parsePath(path: string): string[] | undefined {
  if (typeof path !== 'string' || path.length === 0) {
    return undefined;
  }

  const segments = path.split('.');
  if (segments.some(segment => segment.length === 0 || FORBIDDEN_SEGMENTS.has(segment))) {
    return undefined;
  }

  return segments;
}

export function isMapping(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a 1-based array position
 */
function parsePosition(segment: string | number): number | undefined {
  const position = typeof segment === 'number' ? segment : /^\d+$/.test(segment) ? Number(segment) : NaN;
  return Number.isInteger(position) && position >= 1 ? position : undefined;
}

function childOf(node: JsonValue | undefined, segment: string): JsonValue | undefined {
  if (Array.isArray(node)) {
    const position = parsePosition(segment);
    return position === undefined ? undefined : node[position - 1];
  }
  if (isMapping(node) && Object.prototype.hasOwnProperty.call(node, segment)) {
    return node[segment];
  }
  return undefined;
}

function resolveSegments(root: JsonObject, segments: readonly string[]): JsonValue | undefined {
  let node: JsonValue | undefined = root;
  for (const segment of segments) {
    node = childOf(node, segment);
    if (node === undefined) {
      return undefined;
    }
  }
  return node;
}

/**
 * Resolve a path. Missing segments and malformed paths give undefined.
 */
export function getPath(root: JsonObject, path: string): JsonValue | undefined {
  const segments = parsePath(path);
  return segments ? resolveSegments(root, segments) : undefined;
}

/**
 * Assign, append (`++`), remove by position (`--`) or delete (undefined value).
 * Deleting a key that is not there fails.
 */
export function setPath(root: JsonObject, path: string, value: JsonValue | undefined): boolean {
  const segments = parsePath(path);
  if (!segments) {
    return false;
  }

  const key = segments[segments.length - 1];
  const parent = resolveSegments(root, segments.slice(0, -1));

  if (key === APPEND_SEGMENT) {
    if (!Array.isArray(parent) || value === undefined) {
      return false;
    }
    parent.push(value);
    return true;
  }

  if (key === REMOVE_SEGMENT) {
    if (!Array.isArray(parent) || (typeof value !== 'number' && typeof value !== 'string')) {
      return false;
    }
    const position = parsePosition(value);
    if (position === undefined || position > parent.length) {
      return false;
    }
    parent.splice(position - 1, 1);
    return true;
  }

  if (Array.isArray(parent)) {
    const position = parsePosition(key);
    if (value === undefined || position === undefined || position > parent.length) {
      return false;
    }
    parent[position - 1] = value;
    return true;
  }

  if (!isMapping(parent)) {
    return false;
  }

  if (value === undefined) {
    if (!Object.prototype.hasOwnProperty.call(parent, key)) {
      return false;
    }
    delete parent[key];
  } else {
    parent[key] = value;
  }
  return true;
}

/**
 * Append to the array found at `path`
 */
export function insertAt(root: JsonObject, path: string, value: JsonValue): boolean {
  const node = getPath(root, path);
  if (!Array.isArray(node)) {
    return false;
  }
  node.push(value);
  return true;
}

/**
 * Remove the first element deep-equal to `value` from the array at `path`
 */
export function removeFrom(root: JsonObject, path: string, value: JsonValue): boolean {
  const node = getPath(root, path);
  if (!Array.isArray(node)) {
    return false;
  }

  const index = node.findIndex(item => isDeepStrictEqual(item, value));
  if (index === -1) {
    return false;
  }
  node.splice(index, 1);
  return true;
}

/**
 * Add `delta` to the number stored at `path`
 */
export function incrementAt(root: JsonObject, path: string, delta: number): boolean {
  const segments = parsePath(path);
  if (!segments || !Number.isFinite(delta)) {
    return false;
  }

  const current = resolveSegments(root, segments);
  if (typeof current !== 'number') {
    return false;
  }

  return setPath(root, path, current + delta);
}

/**
 * Copy every template key missing from `target` (recursing into nested
 * mappings). Never overwrites or removes. Returns true if anything was added.
 */
export function mergeMissing(target: JsonObject, template: JsonObject): boolean {
  let changed = false;

  for (const [key, templateValue] of Object.entries(template)) {
    if (!Object.prototype.hasOwnProperty.call(target, key)) {
      target[key] = cloneJson(templateValue);
      changed = true;
      continue;
    }

    const existing = target[key];
    if (isMapping(existing) && isMapping(templateValue)) {
      changed = mergeMissing(existing, templateValue) || changed;
    }
  }

  return changed;
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}
