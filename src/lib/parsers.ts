import { defineEntry } from "../sdk/rpc/codec.js";
import type { NamedParams, ParamValue } from "../sdk/rpc/types.js";

/**
 * Parse `key=value` CLI arguments into named params.
 *
 * Values are coerced: `true`/`false` → boolean, `null` → null, finite
 * numbers → number, anything else stays a string. Quote-wrapping a value
 * (`name='42'`) keeps it a string.
 */
export function parseParamPairs(pairs: readonly string[]): NamedParams {
  const params: Record<string, ParamValue> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new Error(`Expected key=value, got "${pair}"`);
    }
    defineEntry(params, pair.slice(0, eq), coerceValue(pair.slice(eq + 1)));
  }
  return params;
}

export function coerceValue(raw: string): ParamValue {
  const quoted = /^'(.*)'$|^"(.*)"$/.exec(raw);
  if (quoted) return quoted[1] ?? quoted[2] ?? "";
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (raw === "null") return null;
  if (raw.trim() !== "") {
    const n = Number(raw);
    if (Number.isFinite(n)) return n;
  }
  return raw;
}

/** Parse a positive duration in milliseconds, e.g. from `--timeout`. */
export function parseTimeoutMs(value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Timeout must be a positive number of milliseconds, got ${value}`);
  }
  return value;
}
