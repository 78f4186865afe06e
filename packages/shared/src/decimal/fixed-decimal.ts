import { InvalidDecimalError } from "../errors";

/** Exchange tick granularity for both prices and amounts. */
export const PRICE_DECIMALS = 8;
export const TICK_SIZE = "0.00000001";

export type DecimalInput = string | number;

type ScaledDecimal = { int: bigint; scale: number };

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const QUANTIZED_PATTERN = /^\d+\.\d{8}$/;
/** Largest exponent magnitude accepted in `1e<n>` notation. */
export const MAX_DECIMAL_EXPONENT = 1000;

function pow10(exp: number): bigint {
  return 10n ** BigInt(exp);
}

function parseScaled(value: DecimalInput): ScaledDecimal {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new InvalidDecimalError(String(value));
  }
  // Numbers go through their shortest round-trip text, never through scaling math.
  const text = typeof value === "number" ? String(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) throw new InvalidDecimalError(text);

  const [, sign, whole = "", frac = "", exp] = match;
  if (!whole && !frac) throw new InvalidDecimalError(text);

  const exponent = exp ? Number.parseInt(exp, 10) : 0;
  if (Math.abs(exponent) > MAX_DECIMAL_EXPONENT) throw new InvalidDecimalError(text);

  let int = BigInt(`${whole}${frac}` || "0");
  let scale = frac.length - exponent;
  if (scale < 0) {
    int *= pow10(-scale);
    scale = 0;
  }
  return { int: sign === "-" ? -int : int, scale };
}

function rescale(value: ScaledDecimal, scale: number): bigint {
  if (value.scale === scale) return value.int;
  if (value.scale < scale) return value.int * pow10(scale - value.scale);
  // bigint division truncates toward zero
  return value.int / pow10(value.scale - scale);
}

function formatScaled(int: bigint, scale: number, trimZeros: boolean): string {
  const negative = int < 0n;
  const digits = (negative ? -int : int).toString();
  if (scale === 0) return negative ? `-${digits}` : digits;

  const padded = digits.padStart(scale + 1, "0");
  const whole = padded.slice(0, -scale);
  const frac = trimZeros ? padded.slice(-scale).replace(/0+$/, "") : padded.slice(-scale);
  const out = frac.length ? `${whole}.${frac}` : whole;
  return negative ? `-${out}` : out;
}

function align(a: ScaledDecimal, b: ScaledDecimal): { a: bigint; b: bigint; scale: number } {
  const scale = Math.max(a.scale, b.scale);
  return { a: rescale(a, scale), b: rescale(b, scale), scale };
}

/**
 * Truncates toward zero onto the 8-decimal tick grid and renders exactly
 * eight fractional digits, so equal values always share one spelling.
 */
export function quantize(value: DecimalInput): string {
  return formatScaled(rescale(parseScaled(value), PRICE_DECIMALS), PRICE_DECIMALS, false);
}

export function isQuantized(value: string): boolean {
  return QUANTIZED_PATTERN.test(value);
}

export function isDecimal(value: string): boolean {
  try {
    parseScaled(value);
    return true;
  } catch {
    return false;
  }
}

export function multiplyDecimal(a: DecimalInput, b: DecimalInput): string {
  const left = parseScaled(a);
  const right = parseScaled(b);
  return formatScaled(left.int * right.int, left.scale + right.scale, true);
}

export function addDecimal(a: DecimalInput, b: DecimalInput): string {
  const aligned = align(parseScaled(a), parseScaled(b));
  return formatScaled(aligned.a + aligned.b, aligned.scale, true);
}

export function subtractDecimal(a: DecimalInput, b: DecimalInput): string {
  const aligned = align(parseScaled(a), parseScaled(b));
  return formatScaled(aligned.a - aligned.b, aligned.scale, true);
}

export function sumDecimals(values: readonly DecimalInput[]): string {
  return values.reduce<string>((total, value) => addDecimal(total, value), "0");
}

export function compareDecimal(a: DecimalInput, b: DecimalInput): -1 | 0 | 1 {
  const aligned = align(parseScaled(a), parseScaled(b));
  if (aligned.a === aligned.b) return 0;
  return aligned.a < aligned.b ? -1 : 1;
}

export function maxDecimal(values: readonly string[]): string | undefined {
  return values.reduce<string | undefined>((best, v) => (best === undefined || compareDecimal(v, best) > 0 ? v : best), undefined);
}

export function minDecimal(values: readonly string[]): string | undefined {
  return values.reduce<string | undefined>((best, v) => (best === undefined || compareDecimal(v, best) < 0 ? v : best), undefined);
}

export function discountPrice(reference: DecimalInput, discount: DecimalInput): string {
  return quantize(multiplyDecimal(reference, subtractDecimal(1, discount)));
}

export function markupPrice(reference: DecimalInput, markup: DecimalInput): string {
  return quantize(multiplyDecimal(reference, addDecimal(1, markup)));
}

/** `0.02` -> `"2"`, `0.055` -> `"5.5"`. */
export function formatPercent(fraction: DecimalInput): string {
  return multiplyDecimal(fraction, 100);
}
