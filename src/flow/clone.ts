/**
 * Deep copy for branch-local state.
 *
 * Class instances keep their prototype, cycles stay cycles, and values that
 * implement Cloneable copy themselves. Functions are shared, not copied.
 * Objects holding ES private fields cannot be copied field by field and
 * should implement Cloneable.
 */

import { RoutingError } from "../errors";
import type { Cloneable, MovePayload } from "./types";

export function isCloneable(value: unknown): value is Cloneable {
  return (
    typeof value === "object" &&
    value !== null &&
    "clone" in value &&
    typeof value.clone === "function"
  );
}

/**
 * A loosely-typed mapping: an object literal or a null-prototype object
 */
export function isPlainRecord(
  value: unknown,
): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Whether patch fields can be written onto the value
 */
export function isMergeable(value: unknown): value is object {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set) &&
    !(value instanceof Date) &&
    !(value instanceof RegExp) &&
    !ArrayBuffer.isView(value)
  );
}

function copy(value: unknown, seen: Map<object, unknown>): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }

  const known = seen.get(value);
  if (known !== undefined) return known;

  if (isCloneable(value)) {
    const cloned = value.clone();
    seen.set(value, cloned);
    return cloned;
  }

  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof RegExp) return new RegExp(value.source, value.flags);
  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    return structuredClone(value);
  }

  if (value instanceof Map) {
    const out = new Map<unknown, unknown>();
    seen.set(value, out);
    for (const [k, v] of value) {
      out.set(copy(k, seen), copy(v, seen));
    }
    return out;
  }

  if (value instanceof Set) {
    const out = new Set<unknown>();
    seen.set(value, out);
    for (const v of value) {
      out.add(copy(v, seen));
    }
    return out;
  }

  if (Array.isArray(value)) {
    const out: unknown[] = [];
    seen.set(value, out);
    for (const item of value) {
      out.push(copy(item, seen));
    }
    return out;
  }

  const out: object = Object.create(Object.getPrototypeOf(value));
  seen.set(value, out);
  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (!descriptor) continue;
    // Data fields of a copy belong to the new branch, frozen or not
    if ("value" in descriptor) {
      descriptor.value = copy(descriptor.value, seen);
      descriptor.writable = true;
      descriptor.configurable = true;
    }
    Object.defineProperty(out, key, descriptor);
  }
  return out;
}

/**
 * Copy a value so that no mutable substructure is shared with the original
 */
export function cloneDeep<T>(value: T): T;
export function cloneDeep(value: unknown): unknown {
  return copy(value, new Map());
}

/**
 * Write each patch field onto the target. Fields not in the patch are left
 * alone; patch values are copied so the patch itself stays unaliased.
 * Throws RoutingError when a field cannot be written (a getter without a
 * setter, a non-extensible target).
 */
export function mergeFields(target: object, patch: MovePayload): void {
  for (const [key, value] of Object.entries(patch)) {
    if (!Reflect.set(target, key, cloneDeep(value))) {
      throw new RoutingError(`Cannot merge patch field "${key}" into change`, {
        field: key,
      });
    }
  }
}
