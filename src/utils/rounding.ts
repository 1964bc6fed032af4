export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value) || Number.isInteger(value)) return value;
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  // Avoid emitting -0
  return rounded === 0 ? 0 : rounded;
}

/**
 * Round every non-integer number inside `value` to `digits` decimals.
 * Strings, integers, booleans and null pass through; arrays and plain objects
 * are copied with their contents rounded. The shape of T is preserved.
 */
export function roundFloats<T>(value: T, digits: number): T;
export function roundFloats(value: unknown, digits: number): unknown {
  if (typeof value === "number") {
    return roundTo(value, digits);
  }
  if (Array.isArray(value)) {
    return value.map((item) => roundFloats(item, digits));
  }
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = roundFloats(item, digits);
    }
    return out;
  }
  return value;
}
