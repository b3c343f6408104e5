import { fraction, fractionFromTicks, type Fraction } from '../core/fraction.js';
import type { Color, Point, Rect, Size } from '../core/score.js';
import type { XmlStreamReader } from './xml-stream.js';

/** Parse base-10 integer values with `undefined` on failure or past the safe integer range. */
export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/** Parse float values with `undefined` on failure. */
export function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Read a rational value in either style:
 *   `<move z="2" n="4"/>`  (attributes)
 *   `<move>2/4</move>`     (text; a bare integer is a tick count)
 * Non-empty text wins over the attributes.
 */
export function readFraction(reader: XmlStreamReader): Fraction {
  let numerator = parseOptionalInt(reader.stringAttribute('z', '0')) ?? 0;
  let denominator = parseOptionalInt(reader.stringAttribute('n', '1')) ?? 1;
  const text = reader.readElementText().trim();

  if (text.length > 0) {
    const slash = text.indexOf('/');
    if (slash === -1) {
      return fractionFromTicks(parseOptionalInt(text) ?? 0);
    }
    numerator = parseOptionalInt(text.slice(0, slash)) ?? 0;
    denominator = parseOptionalInt(text.slice(slash + 1)) ?? 1;
  }

  return fraction(numerator, denominator === 0 ? 1 : denominator);
}

/** Integer element text; unparsable text reads as `fallback`. */
export function readInt(reader: XmlStreamReader, fallback = 0): number {
  return parseOptionalInt(reader.readElementText().trim()) ?? fallback;
}

/** Element text as a double clamped to `[min, max]`. */
export function readDouble(reader: XmlStreamReader, min = -Infinity, max = Infinity): number {
  const value = parseOptionalFloat(reader.readElementText().trim()) ?? 0;
  return Math.min(max, Math.max(min, value));
}

/** Boolean element: empty means true, otherwise any non-zero integer. */
export function readBool(reader: XmlStreamReader): boolean {
  const text = reader.readElementText().trim();
  if (text.length === 0) {
    return true;
  }
  return (parseOptionalInt(text) ?? 0) !== 0;
}

export function readPoint(reader: XmlStreamReader): Point {
  const point = { x: reader.doubleAttribute('x', 0), y: reader.doubleAttribute('y', 0) };
  reader.skipCurrentElement();
  return point;
}

/** Color from `r`/`g`/`b` (required) and `a` (defaults to opaque). */
export function readColor(reader: XmlStreamReader): Color {
  const color = {
    r: reader.intAttribute('r'),
    g: reader.intAttribute('g'),
    b: reader.intAttribute('b'),
    a: reader.intAttribute('a', 255)
  };
  reader.skipCurrentElement();
  return color;
}

export function readSize(reader: XmlStreamReader): Size {
  const size = { width: reader.doubleAttribute('w', 0), height: reader.doubleAttribute('h', 0) };
  reader.skipCurrentElement();
  return size;
}

/** Scale factors share the `w`/`h` attribute shape of sizes. */
export function readScale(reader: XmlStreamReader): Size {
  return readSize(reader);
}

export function readRect(reader: XmlStreamReader): Rect {
  const rect = {
    x: reader.doubleAttribute('x', 0),
    y: reader.doubleAttribute('y', 0),
    width: reader.doubleAttribute('w', 0),
    height: reader.doubleAttribute('h', 0)
  };
  reader.skipCurrentElement();
  return rect;
}
