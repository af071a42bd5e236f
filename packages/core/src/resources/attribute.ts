/**
 * Three-state optional attribute
 *
 * `unset`   - the user did not set the attribute
 * `unknown` - the value is computed; the remote host decides it
 * `known`   - an explicit value
 */

export type Attr<T> =
  | { readonly kind: "unset" }
  | { readonly kind: "unknown" }
  | { readonly kind: "known"; readonly value: T };

const UNSET = { kind: "unset" } as const;
const UNKNOWN = { kind: "unknown" } as const;

export function unset<T>(): Attr<T> {
  return UNSET;
}

export function unknown<T>(): Attr<T> {
  return UNKNOWN;
}

export function known<T>(value: T): Attr<T> {
  return { kind: "known", value };
}

export function isKnown<T>(attr: Attr<T>): attr is { readonly kind: "known"; readonly value: T } {
  return attr.kind === "known";
}

/**
 * Map an optional plain value: `undefined` becomes `fallback` (unknown by default)
 */
export function fromOptional<T>(value: T | undefined, fallback: Attr<T> = UNKNOWN): Attr<T> {
  return value === undefined ? fallback : known(value);
}

/**
 * Value of a known attribute, else `fallback`
 */
export function valueOr<T>(attr: Attr<T>, fallback: T): T {
  return isKnown(attr) ? attr.value : fallback;
}

/**
 * Pick the chown/chgrp argument: a known numeric id wins over a known name;
 * with neither known there is nothing to apply.
 */
export function resolveIdOrName(id: Attr<number>, name: Attr<string>): string | undefined {
  if (isKnown(id)) {
    return String(id.value);
  }
  if (isKnown(name)) {
    return name.value;
  }
  return undefined;
}
