/**
 * Number formatting for table output.
 *
 * Matches printf's `%.{precision}g`: fixed notation unless the decimal
 * exponent is below -4 or at least the precision, trailing zeros dropped.
 */

export const DEFAULT_PRECISION = 15;

function stripZeros(digits: string): string {
  return digits.includes(".") ? digits.replace(/\.?0+$/, "") : digits;
}

export function formatSignificant(value: number, precision = DEFAULT_PRECISION): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  if (value === 0) return Object.is(value, -0) ? "-0" : "0";

  const [mantissa, exponentText] = value.toExponential(precision - 1).split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= precision) {
    const sign = exponent < 0 ? "-" : "+";
    const magnitude = String(Math.abs(exponent)).padStart(2, "0");
    return `${stripZeros(mantissa)}e${sign}${magnitude}`;
  }

  return stripZeros(value.toFixed(precision - 1 - exponent));
}
