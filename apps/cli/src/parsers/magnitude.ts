import { MAGNITUDE_EXPONENTS } from "@slurm-availability/shared";
import { MalformedNumberError } from "@/lib/errors.ts";

// Either side of the point may be empty ("5.", ".5"), not both
const DECIMAL = /^(\d+\.?\d*|\.\d+)$/;

/**
 * Parse a sreport figure such as `1,234`, `12.5M` or `3k` into a plain number.
 *
 * The suffix is applied as a decimal exponent (`12.5e6`) rather than by
 * multiplying, so `1.1k` comes out as exactly 1100.
 */
export function parseMagnitude(token: string): number {
  let digits = token.trim();
  let exponent = 0;

  const suffix = digits.slice(-1).toLowerCase();
  const suffixExponent = MAGNITUDE_EXPONENTS[suffix];
  if (suffixExponent !== undefined) {
    exponent = suffixExponent;
    digits = digits.slice(0, -1);
  }

  digits = digits.replaceAll(",", "");
  if (!DECIMAL.test(digits)) {
    throw new MalformedNumberError(token);
  }

  return Number(`${digits}e${exponent}`);
}
