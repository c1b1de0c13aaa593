import { InvalidInputError, PinCode32 } from "./codec/pincode32";

/** Longest decimal string accepted or produced, in digits. */
export const MAX_DECIMAL_DIGITS = 4300;

export const INVALID_INPUT_RESPONSE = "ERROR: Invalid Input";

const codec = new PinCode32();

function toDecimal(value: bigint): string {
  const decimal = value.toString();
  if (decimal.length > MAX_DECIMAL_DIGITS) {
    throw new InvalidInputError(`Result exceeds ${MAX_DECIMAL_DIGITS} digits`);
  }
  return decimal;
}

const DECIMAL_DIGITS = /^\p{Nd}+$/u;
const DECIMAL_DIGIT = /^\p{Nd}$/u;

/**
 * Value of a Unicode decimal digit. Every script lays its digits out as
 * contiguous 0-9 runs, so the value is the distance from the start of the
 * run, modulo 10 where runs sit back to back.
 */
function digitValue(char: string): number {
  const codePoint = char.codePointAt(0) ?? 0;
  let offset = 0;
  while (codePoint - offset > 0 && DECIMAL_DIGIT.test(String.fromCodePoint(codePoint - offset - 1))) {
    offset++;
  }
  return offset % 10;
}

function fromDecimal(input: string): bigint {
  const digits = [...input];
  if (digits.length > MAX_DECIMAL_DIGITS) {
    throw new InvalidInputError(`Input exceeds ${MAX_DECIMAL_DIGITS} digits`);
  }
  return BigInt(digits.map((char) => (char >= "0" && char <= "9" ? char : String(digitValue(char)))).join(""));
}

/**
 * Converts one path segment:
 * - a trailing `b32` (any case) forces base-32 to decimal
 * - anything that is not all decimal digits is decoded from base-32
 * - all decimal digits, in any script, are encoded to base-32
 *
 * Never throws; failures come back as `ERROR: ...` text.
 */
export function convert(raw: string): string {
  const input = raw.trim();

  try {
    if (input.toLowerCase().endsWith("b32")) {
      return toDecimal(codec.decode(codec.normalize(input.slice(0, -3))));
    }

    if (!DECIMAL_DIGITS.test(input)) {
      return toDecimal(codec.decode(codec.normalize(input)));
    }

    return codec.encode(fromDecimal(input));
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return INVALID_INPUT_RESPONSE;
    }
    return `ERROR: ${error instanceof Error ? error.message : String(error)}`;
  }
}
