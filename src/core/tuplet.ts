import {
  addFractions,
  compareFractions,
  divideFractions,
  fraction,
  fractionsEqual,
  multiplyFractions,
  subtractFractions,
  ZERO_FRACTION,
  type Fraction
} from './fraction.js';
import type { Tuplet, TupletElement } from './score.js';

/** Notated length an element occupies inside its tuplet. */
export function tupletElementDuration(element: TupletElement): Fraction {
  return element.kind === 'tuplet' ? element.tuplet.ticks : element.duration;
}

/** Notated length the tuplet can hold: `baseLength × actual`. */
export function tupletCapacity(tuplet: Tuplet): Fraction {
  return multiplyFractions(tuplet.baseLength, fraction(tuplet.actual));
}

/** Sum of the notated lengths of all members. */
export function tupletContentDuration(tuplet: Tuplet): Fraction {
  return tuplet.elements.reduce<Fraction>(
    (total, element) => addFractions(total, tupletElementDuration(element)),
    ZERO_FRACTION
  );
}

/** Product of `normal/actual` over `tuplet` and every enclosing tuplet. */
export function tupletTimeScale(tuplet: Tuplet): Fraction {
  let scale = fraction(1);
  for (let current: Tuplet | undefined = tuplet; current; current = current.parent) {
    scale = multiplyFractions(scale, fraction(current.normal, current.actual));
  }
  return scale;
}

/** Convert a notated length inside `tuplet` to real (playback) time. */
export function tupletRealDuration(tuplet: Tuplet, notated: Fraction): Fraction {
  return multiplyFractions(notated, tupletTimeScale(tuplet));
}

/** Real span of the whole group. */
export function tupletRealSpan(tuplet: Tuplet): Fraction {
  return tuplet.parent ? tupletRealDuration(tuplet.parent, tuplet.ticks) : tuplet.ticks;
}

/** Stable sort of members by tick; nested tuplets can stream out of order. */
export function sortTupletElements(tuplet: Tuplet): void {
  tuplet.elements.sort((left, right) => compareFractions(left.tick, right.tick));
}

/**
 * Repair a mismatch between content, base length and duration.
 * Overfull content wins over the declared base length; the duration is
 * always `baseLength × normal`. Returns true when anything changed.
 */
export function sanitizeTuplet(tuplet: Tuplet): boolean {
  let changed = false;

  const content = tupletContentDuration(tuplet);
  if (compareFractions(content, tupletCapacity(tuplet)) > 0) {
    tuplet.baseLength = divideFractions(content, fraction(tuplet.actual));
    changed = true;
  }

  const expectedTicks = multiplyFractions(tuplet.baseLength, fraction(tuplet.normal));
  if (!fractionsEqual(expectedTicks, tuplet.ticks)) {
    tuplet.ticks = expectedTicks;
    changed = true;
  }

  return changed;
}

/**
 * Fill leading and trailing gaps with generated rests; returns the number added.
 * Member ticks and gaps are real time; rest durations are notated inside `tuplet`.
 */
export function addMissingTupletElements(tuplet: Tuplet): number {
  const scale = tupletTimeScale(tuplet);
  const realEnd = addFractions(tuplet.tick, tupletRealSpan(tuplet));
  let added = 0;

  const first = tuplet.elements[0];
  if (!first) {
    return 0;
  }

  const leadingGap = subtractFractions(first.tick, tuplet.tick);
  if (compareFractions(leadingGap, ZERO_FRACTION) > 0) {
    tuplet.elements.unshift({
      kind: 'rest',
      tick: tuplet.tick,
      duration: divideFractions(leadingGap, scale),
      generated: true
    });
    added += 1;
  }

  const last = tuplet.elements.at(-1);
  if (last) {
    const contentEnd = addFractions(last.tick, tupletRealDuration(tuplet, tupletElementDuration(last)));
    const trailingGap = subtractFractions(realEnd, contentEnd);
    if (compareFractions(trailingGap, ZERO_FRACTION) > 0) {
      tuplet.elements.push({
        kind: 'rest',
        tick: contentEnd,
        duration: divideFractions(trailingGap, scale),
        generated: true
      });
      added += 1;
    }
  }

  return added;
}
