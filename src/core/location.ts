import {
  addFractions,
  compareFractions,
  fractionsEqual,
  negateFraction,
  ZERO_FRACTION,
  type Fraction
} from './fraction.js';

/**
 * Addressable point in the document's time/voice space.
 * Absolute locations count from the document start (or, for `frac`, from the
 * start of `measure`); relative locations count from another location.
 * Fields left `undefined` are unset and get filled from the reader cursor.
 */
export interface Location {
  relative: boolean;
  track?: number;
  frac?: Fraction;
  measure?: number;
}

/** Absolute location with every field unset. */
export function absoluteLocation(): Location {
  return { relative: false };
}

/** Relative location with zero offsets. */
export function relativeLocation(): Location {
  return {
    relative: true,
    track: 0,
    frac: ZERO_FRACTION,
    measure: 0
  };
}

/** Convert a relative location to absolute by adding `ref`; absolute input is returned as-is. */
export function toAbsolute(loc: Location, ref: Location): Location {
  if (!loc.relative) {
    return { ...loc };
  }

  return {
    relative: false,
    track: (ref.track ?? 0) + (loc.track ?? 0),
    frac: addFractions(ref.frac ?? ZERO_FRACTION, loc.frac ?? ZERO_FRACTION),
    measure: (ref.measure ?? 0) + (loc.measure ?? 0)
  };
}

/** Convert an absolute location to one relative to `ref`; relative input is returned as-is. */
export function toRelative(loc: Location, ref: Location): Location {
  if (loc.relative) {
    return { ...loc };
  }

  return {
    relative: true,
    track: (loc.track ?? 0) - (ref.track ?? 0),
    frac: addFractions(loc.frac ?? ZERO_FRACTION, negateFraction(ref.frac ?? ZERO_FRACTION)),
    measure: (loc.measure ?? 0) - (ref.measure ?? 0)
  };
}

/** Structural equality: same mode and every field equal (unset only matches unset). */
export function locationsEqual(left: Location, right: Location): boolean {
  if (left.relative !== right.relative || left.track !== right.track || left.measure !== right.measure) {
    return false;
  }

  if (left.frac === undefined || right.frac === undefined) {
    return left.frac === right.frac;
  }

  return fractionsEqual(left.frac, right.frac);
}

/** Temporal order of two locations in the same mode: measure first, then frac. */
export function compareLocations(left: Location, right: Location): number {
  const measureDelta = (left.measure ?? 0) - (right.measure ?? 0);
  if (measureDelta !== 0) {
    return measureDelta;
  }

  return compareFractions(left.frac ?? ZERO_FRACTION, right.frac ?? ZERO_FRACTION);
}
