/** Ticks per quarter note used for integer tick mirrors. */
export const TICKS_PER_QUARTER = 480;

/** Ticks in one whole note, the unit of `Fraction` values. */
export const TICKS_PER_WHOLE = TICKS_PER_QUARTER * 4;

/** Rational time position or duration, measured in whole notes. */
export interface Fraction {
  numerator: number;
  denominator: number;
}

/** Zero-length fraction. */
export const ZERO_FRACTION: Fraction = { numerator: 0, denominator: 1 };

/** Build a fraction with a positive denominator (not reduced). */
export function fraction(numerator: number, denominator = 1): Fraction {
  assertIntegerParts(numerator, denominator);
  if (denominator === 0) {
    throw new RangeError(`Fraction ${numerator}/0 has a zero denominator`);
  }

  if (denominator < 0) {
    return { numerator: -numerator, denominator: -denominator };
  }

  return { numerator, denominator };
}

/** Reduce a fraction to lowest terms. */
export function reduceFraction(value: Fraction): Fraction {
  if (value.numerator === 0) {
    return ZERO_FRACTION;
  }

  assertIntegerParts(value.numerator, value.denominator);
  const divisor = greatestCommonDivisor(Math.abs(value.numerator), Math.abs(value.denominator));
  return fraction(value.numerator / divisor, value.denominator / divisor);
}

export function addFractions(left: Fraction, right: Fraction): Fraction {
  if (left.denominator === right.denominator) {
    return reduceFraction({ numerator: left.numerator + right.numerator, denominator: left.denominator });
  }

  return reduceFraction({
    numerator: left.numerator * right.denominator + right.numerator * left.denominator,
    denominator: left.denominator * right.denominator
  });
}

export function subtractFractions(left: Fraction, right: Fraction): Fraction {
  return addFractions(left, negateFraction(right));
}

export function negateFraction(value: Fraction): Fraction {
  return { numerator: -value.numerator, denominator: value.denominator };
}

export function multiplyFractions(left: Fraction, right: Fraction): Fraction {
  return reduceFraction(fraction(left.numerator * right.numerator, left.denominator * right.denominator));
}

export function divideFractions(left: Fraction, right: Fraction): Fraction {
  return reduceFraction(fraction(left.numerator * right.denominator, left.denominator * right.numerator));
}

/** Negative when `left < right`, zero when equal, positive otherwise. */
export function compareFractions(left: Fraction, right: Fraction): number {
  return left.numerator * right.denominator - right.numerator * left.denominator;
}

/** Value equality, independent of how either side is reduced. */
export function fractionsEqual(left: Fraction, right: Fraction): boolean {
  return compareFractions(left, right) === 0;
}

/** Convert to integer ticks, rounding to the nearest tick. */
export function fractionToTicks(value: Fraction): number {
  return Math.round((value.numerator * TICKS_PER_WHOLE) / value.denominator);
}

/** Build a reduced fraction from integer ticks. */
export function fractionFromTicks(ticks: number): Fraction {
  return reduceFraction(fraction(ticks, TICKS_PER_WHOLE));
}

/** Parse `"a/b"` text; a bare integer is read as whole notes (`a/1`). */
export function parseFractionText(text: string): Fraction | undefined {
  const trimmed = text.trim();
  const slash = trimmed.indexOf('/');
  const numerator = Number.parseInt(slash === -1 ? trimmed : trimmed.slice(0, slash), 10);
  const denominator = slash === -1 ? 1 : Number.parseInt(trimmed.slice(slash + 1), 10);

  if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator) || denominator === 0) {
    return undefined;
  }

  return fraction(numerator, denominator);
}

/** Serialize in the `a/b` text form. */
export function formatFraction(value: Fraction): string {
  return `${value.numerator}/${value.denominator}`;
}

function assertIntegerParts(numerator: number, denominator: number): void {
  if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator)) {
    throw new RangeError(`Fraction ${numerator}/${denominator} needs safe integer parts`);
  }
}

function greatestCommonDivisor(left: number, right: number): number {
  let a = left;
  let b = right;
  while (b !== 0) {
    const next = a % b;
    a = b;
    b = next;
  }
  return a === 0 ? 1 : a;
}
