/**
 * Alias Registry - Maps short names to full type names
 *
 * Example:
 * - "string" → "System.String"
 * - "int"    → "System.Int32"
 * - "list"   → "System.Collections.Generic.List`1" (user-registered)
 *
 * One registry lives for one resolution session. It is passed explicitly to
 * whoever needs it; there is no process-wide table.
 */

import type { Result } from "../types/result.js";

// ═══════════════════════════════════════════════════════════════════════════
// PRIMITIVE MAPPINGS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Built-in short names and the types they stand for.
 */
export const PRIMITIVE_ALIASES: ReadonlyMap<string, string> = new Map([
  ["object", "System.Object"],
  ["string", "System.String"],
  ["bool", "System.Boolean"],
  ["char", "System.Char"],
  ["byte", "System.Byte"],
  ["short", "System.Int16"],
  ["int", "System.Int32"],
  ["long", "System.Int64"],
  ["float", "System.Single"],
  ["double", "System.Double"],
  ["decimal", "System.Decimal"],
  ["void", "System.Void"],
]);

/**
 * Reverse of PRIMITIVE_ALIASES, used when rendering type names.
 */
export const SHORT_TYPE_NAMES: ReadonlyMap<string, string> = new Map(
  [...PRIMITIVE_ALIASES].map(([alias, fullName]) => [fullName, alias])
);

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

export type AliasRegistry = {
  /** Case-insensitive lookup */
  readonly resolve: (alias: string) => string | undefined;
  /** Fails when the alias is a built-in or already bound to another type */
  readonly add: (alias: string, fullName: string) => Result<void, string>;
  readonly remove: (alias: string) => boolean;
  /** User-registered aliases, in registration order */
  readonly entries: () => readonly (readonly [string, string])[];
};

export const createAliasRegistry = (
  initial: Readonly<Record<string, string>> = {}
): AliasRegistry => {
  const custom = new Map<string, { alias: string; fullName: string }>();

  const resolve = (alias: string): string | undefined => {
    const key = alias.toLowerCase();
    return PRIMITIVE_ALIASES.get(key) ?? custom.get(key)?.fullName;
  };

  const add = (alias: string, fullName: string): Result<void, string> => {
    const key = alias.toLowerCase();
    if (PRIMITIVE_ALIASES.has(key)) {
      return { ok: false, error: `'${alias}' is a built-in alias` };
    }
    const existing = custom.get(key);
    if (existing && existing.fullName !== fullName) {
      return {
        ok: false,
        error: `'${alias}' is already an alias for ${existing.fullName}`,
      };
    }
    custom.set(key, { alias, fullName });
    return { ok: true, value: undefined };
  };

  for (const [alias, fullName] of Object.entries(initial)) {
    // Later duplicates of the same alias are ignored, first one stands
    add(alias, fullName);
  }

  return {
    resolve,
    add,
    remove: (alias) => custom.delete(alias.toLowerCase()),
    entries: () =>
      [...custom.values()].map((e) => [e.alias, e.fullName] as const),
  };
};
