import { discreteOutput, type DiscreteOutputDescriptor } from "../schemas/output.js";
import { MAX_BITS, type BitFieldConfigT } from "../schemas/field-config.js";
import { log } from "../utils/telemetry.js";
import { BitRangeError, InvalidConfigError, InvalidValueError, LengthError } from "./errors.js";
import { argmax, type Field } from "./field.js";

export interface BitFieldOptions {
  name: string;
  /** Binary digits; the field represents integers in [0, 2^numBits) */
  numBits: number;
}

const ZERO_BIT = [1, 0] as const;
const ONE_BIT = [0, 1] as const;

/**
 * Fixed-width integer codec.
 *
 * Each bit, most significant first, becomes an independent 2-wide one-hot
 * channel: 0 → [1, 0], 1 → [0, 1].
 */
export class BitField implements Field<number, readonly number[]> {
  readonly kind = "bit";
  readonly name: string;
  readonly numBits: number;
  readonly width: number;
  /** Exclusive upper bound of the representable domain */
  readonly limit: number;

  constructor(options: BitFieldOptions) {
    const { name, numBits } = options;

    if (!Number.isInteger(numBits) || numBits < 1 || numBits > MAX_BITS) {
      throw new InvalidConfigError(`numBits must be an integer in [1, ${MAX_BITS}], got ${numBits}`, name);
    }

    this.name = name;
    this.numBits = numBits;
    this.width = 2 * numBits;
    this.limit = 2 ** numBits;

    log.debug({ field: name, kind: this.kind, width: this.width }, "Bit field created");
  }

  static fromConfig(cfg: BitFieldConfigT): BitField {
    return new BitField({ name: cfg.name, numBits: cfg.numBits });
  }

  normalize(decimal: number): number[] {
    if (!Number.isInteger(decimal) || decimal < 0 || decimal >= this.limit) {
      throw new BitRangeError(decimal, this.numBits, this.name);
    }

    const binary = decimal.toString(2).padStart(this.numBits, "0");
    const bits: number[] = [];
    for (const digit of binary) {
      bits.push(...(digit === "1" ? ONE_BIT : ZERO_BIT));
    }
    return bits;
  }

  denormalize(bits: readonly number[]): number {
    const raw: unknown = bits;
    if (!Array.isArray(raw)) {
      throw new InvalidValueError("Bit array should be a list", this.name);
    }
    if (bits.length !== this.width) {
      throw new LengthError(bits.length, this.width, this.name);
    }

    let decimal = 0;
    for (let i = 0; i < this.numBits; i++) {
      const bit = argmax(bits.slice(2 * i, 2 * i + 2), this.name);
      decimal = decimal * 2 + bit;
    }
    return decimal;
  }

  /**
   * One discrete descriptor per bit. The model treats each bit as its own
   * categorical channel rather than a single fused one.
   */
  describe(): DiscreteOutputDescriptor[] {
    return Array.from({ length: this.numBits }, () => discreteOutput(2));
  }

  toConfig(): BitFieldConfigT {
    return { type: this.kind, name: this.name, numBits: this.numBits };
  }
}
