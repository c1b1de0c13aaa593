/**
 * PinCode32: a base-32 alphabet for human-typed PIN codes.
 *
 * The alphabet leaves out I, L, O and Z, and writes digit 27 as a lowercase
 * `u`. Encoding always emits the alphabet verbatim; decoding is forgiving
 * about letter case.
 */

export const PINCODE32_ALPHABET = "0123456789ABCDEFGHJKMNPQRSTuVWXY";

const BASE = 32n;

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class PinCode32 {
  private readonly decodeMap = new Map<string, number>();

  constructor(private readonly alphabet: string = PINCODE32_ALPHABET) {
    [...alphabet].forEach((symbol, index) => this.decodeMap.set(symbol, index));

    // lowercase input for every letter except u, which is already lowercase
    for (const [symbol, value] of [...this.decodeMap]) {
      if (/[A-Z]/.test(symbol)) {
        this.decodeMap.set(symbol.toLowerCase(), value);
      }
    }

    const u = this.decodeMap.get("u");
    if (u !== undefined) {
      this.decodeMap.set("U", u);
    }
  }

  /** Encodes a non-negative integer, padded to at least two symbols. */
  encode(value: bigint): string {
    if (value < 0n) {
      throw new InvalidInputError(`Cannot encode negative value: ${value}`);
    }

    const symbols: string[] = [];
    let rest = value;
    while (rest > 0n) {
      symbols.push(this.symbolAt(Number(rest % BASE)));
      rest /= BASE;
    }

    return symbols.reverse().join("").padStart(2, "0");
  }

  /**
   * Canonicalizes user input before decoding: `U`/`u` become `u`, any other
   * ASCII lowercase letter is uppercased, everything else is left alone.
   */
  normalize(input: string): string {
    let out = "";
    for (const char of input) {
      if (char === "U" || char === "u") {
        out += "u";
      } else if (char >= "a" && char <= "z") {
        out += char.toUpperCase();
      } else {
        out += char;
      }
    }
    return out;
  }

  decode(input: string): bigint {
    let total = 0n;
    for (const char of input) {
      const value = this.decodeMap.get(char);
      if (value === undefined) {
        throw new InvalidInputError(`Invalid character: ${char}`);
      }
      total = total * BASE + BigInt(value);
    }
    return total;
  }

  private symbolAt(index: number): string {
    const symbol = this.alphabet[index];
    if (symbol === undefined) {
      throw new RangeError(`No symbol for digit ${index}`);
    }
    return symbol;
  }
}
