/** @return value with a fixed number of decimals and a unit suffix */
export function withUnit(value: number, unit: string, digits = 1): string {
  return `${value.toFixed(digits)}${unit}`;
}

/** @return signed value, e.g. "+3.2" or "-20.0" */
export function signed(value: number, digits = 1): string {
  const sign = value >= 0 ? "+" : "";
  return `${sign}${value.toFixed(digits)}`;
}

/** @return interval as "[lower, upper]" */
export function interval(
  bounds: readonly [number, number],
  digits = 1,
): string {
  const [lower, upper] = bounds;
  return `[${lower.toFixed(digits)}, ${upper.toFixed(digits)}]`;
}

/** @return formatted number, or "" for non-numbers */
export function decimal(value: unknown, digits = 1): string {
  if (typeof value !== "number") return "";
  return value.toFixed(digits);
}

/** @return integer with thousands separators */
export function integer(value: unknown): string {
  if (typeof value !== "number") return "";
  return Math.round(value).toLocaleString("en-US");
}

/** @return fraction as a percentage, e.g. 0.123 ==> "12.3%" */
export function percent(value: unknown, digits = 1): string {
  if (typeof value !== "number") return "";
  return `${(value * 100).toFixed(digits)}%`;
}
