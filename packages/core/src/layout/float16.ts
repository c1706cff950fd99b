/**
 * Bit-level conversions between JS numbers and 16-bit floating point formats
 *
 * Values are first rounded to float32, then narrowed.
 */

const scratch = new DataView(new ArrayBuffer(4));

function float32Bits(value: number): number {
  scratch.setFloat32(0, value);
  return scratch.getUint32(0);
}

/**
 * Encode `value` as IEEE 754 binary16 bits, rounding to nearest even
 */
export function toFloat16Bits(value: number): number {
  const bits = float32Bits(value);
  const sign = (bits >>> 16) & 0x8000;
  const exponent = (bits >>> 23) & 0xff;
  const mantissa = bits & 0x7fffff;

  if (exponent === 0xff) {
    // quiet NaN keeps a non-zero fraction
    return sign | 0x7c00 | (mantissa !== 0 ? 0x200 : 0);
  }

  const halfExponent = exponent - 127 + 15;
  if (halfExponent >= 0x1f) {
    return sign | 0x7c00;
  }

  if (halfExponent <= 0) {
    if (halfExponent < -10) {
      return sign;
    }
    // subnormal: shift the explicit 24-bit significand into 10 fraction bits
    const significand = mantissa | 0x800000;
    const shift = 14 - halfExponent;
    return sign | roundShifted(significand, shift);
  }

  // carry out of the fraction bumps the exponent, up to infinity
  return sign | ((halfExponent << 10) + roundShifted(mantissa, 13));
}

/**
 * Decode IEEE 754 binary16 bits
 */
export function fromFloat16Bits(bits: number): number {
  const sign = (bits & 0x8000) !== 0 ? -1 : 1;
  const exponent = (bits >>> 10) & 0x1f;
  const fraction = bits & 0x3ff;

  if (exponent === 0) {
    return sign * fraction * 2 ** -24;
  }
  if (exponent === 0x1f) {
    return fraction !== 0 ? Number.NaN : sign * Number.POSITIVE_INFINITY;
  }
  return sign * (1 + fraction / 1024) * 2 ** (exponent - 15);
}

/**
 * Encode `value` as bfloat16 bits: the upper half of its float32 bits
 */
export function toBFloat16Bits(value: number): number {
  return float32Bits(value) >>> 16;
}

export function fromBFloat16Bits(bits: number): number {
  scratch.setUint32(0, ((bits & 0xffff) << 16) >>> 0);
  return scratch.getFloat32(0);
}

function roundShifted(value: number, shift: number): number {
  const truncated = value >>> shift;
  const remainder = value & ((1 << shift) - 1);
  const halfway = 1 << (shift - 1);
  if (remainder > halfway || (remainder === halfway && (truncated & 1) === 1)) {
    return truncated + 1;
  }
  return truncated;
}
