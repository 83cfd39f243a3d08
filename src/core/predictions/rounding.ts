// From here on a double has no hundredths left to round.
const NO_FRACTION_ABOVE = 1e15;

/**
 * Half-up (away from zero) rounding to two decimals on the value's decimal
 * representation, so 12.345 becomes 12.35 even though the binary double sits
 * just below it.
 */
export const roundHalfUpTwoDecimals = (value: number): number => {
  if (!Number.isFinite(value)) return value;

  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);
  if (magnitude >= NO_FRACTION_ABOVE) return value;
  const text = String(magnitude);

  const rounded = text.includes("e")
    ? Math.round(magnitude * 100) / 100
    : Number(`${Math.round(Number(`${text}e2`))}e-2`);

  return rounded === 0 ? 0 : sign * rounded;
};

export const parsePredictedValue = (raw: string): number | undefined => {
  const normalized = raw.trim();
  if (normalized === "") return undefined;

  const value = Number(normalized);
  if (!Number.isFinite(value)) return undefined;

  const rounded = roundHalfUpTwoDecimals(value);
  return Number.isFinite(rounded) ? rounded : undefined;
};
