import { DiagnosticCodes } from '../core/diagnostics.js';
import {
  addFractions,
  fractionsEqual,
  fractionToTicks,
  reduceFraction,
  subtractFractions,
  ZERO_FRACTION,
  type Fraction
} from '../core/fraction.js';
import { absoluteLocation, toAbsolute, type Location } from '../core/location.js';
import { currentMeasureAt, type Measure, type ScoreDocument } from '../core/score.js';
import { addDiagnostic, type ParseContext } from './parse-context.js';

/**
 * Running reader position.
 * `tick`/`track` are stored without the paste offsets; the reported position
 * is `tick + tickOffset` and `track + trackOffset`.
 */
export interface TickCursor {
  tick: Fraction;
  /** Integer mirror of `tick` for cheap equality checks. */
  intTick: number;
  track: number;
  tickOffset: Fraction;
  trackOffset: number;
  currentMeasure?: Measure;
  pasteMode: boolean;
}

export interface TickCursorOptions {
  pasteMode?: boolean;
  tickOffset?: Fraction;
  trackOffset?: number;
}

export function createTickCursor(options: TickCursorOptions = {}): TickCursor {
  return {
    tick: ZERO_FRACTION,
    intTick: 0,
    track: 0,
    tickOffset: options.tickOffset ?? ZERO_FRACTION,
    trackOffset: options.trackOffset ?? 0,
    pasteMode: options.pasteMode ?? false
  };
}

/** Absolute position including the paste offset. */
export function cursorTick(cursor: TickCursor): Fraction {
  return addFractions(cursor.tick, cursor.tickOffset);
}

export function cursorTrack(cursor: TickCursor): number {
  return cursor.track + cursor.trackOffset;
}

/** Position relative to the start of the current measure. */
export function rtick(cursor: TickCursor): Fraction {
  return cursor.currentMeasure ? subtractFractions(cursor.tick, cursor.currentMeasure.tick) : cursor.tick;
}

export function setTick(cursor: TickCursor, value: Fraction): void {
  cursor.tick = reduceFraction(value);
  cursor.intTick = fractionToTicks(cursor.tick);
}

export function incTick(cursor: TickCursor, delta: Fraction): void {
  cursor.tick = addFractions(cursor.tick, delta);
  cursor.intTick += fractionToTicks(delta);
}

export function setTrack(cursor: TickCursor, track: number): void {
  cursor.track = track;
}

export function setCurrentMeasure(cursor: TickCursor, measure: Measure | undefined): void {
  cursor.currentMeasure = measure;
}

/** Point `currentMeasure` at the measure structurally containing the cursor. */
export function syncCurrentMeasure(cursor: TickCursor, doc: ScoreDocument): Measure | undefined {
  cursor.currentMeasure = currentMeasureAt(doc, cursorTick(cursor));
  return cursor.currentMeasure;
}

function currentMeasureIndex(cursor: TickCursor): number {
  return cursor.currentMeasure?.index ?? 0;
}

/** Location of the current reader position. */
export function location(cursor: TickCursor, forceAbsolute = false): Location {
  return fillLocation(cursor, absoluteLocation(), forceAbsolute);
}

/**
 * Fill the unset fields of `loc` from the reader position.
 * In paste mode (or when forced) `frac` is the absolute tick and the measure
 * is reported as 0, since pasted content is not measure-anchored yet.
 */
export function fillLocation(cursor: TickCursor, loc: Location, forceAbsolute = false): Location {
  const absoluteFrac = cursor.pasteMode || forceAbsolute;
  return {
    relative: loc.relative,
    track: loc.track ?? cursorTrack(cursor),
    frac: loc.frac ?? (absoluteFrac ? cursorTick(cursor) : rtick(cursor)),
    measure: loc.measure ?? (absoluteFrac ? 0 : currentMeasureIndex(cursor))
  };
}

/** Move the cursor to `loc`, which may be absolute or relative. */
export function setLocation(cursor: TickCursor, loc: Location, ctx: ParseContext): void {
  if (loc.relative) {
    setRelativeLocation(cursor, loc, ctx);
    return;
  }
  setAbsoluteLocation(cursor, loc, ctx);
}

/**
 * Relative move. When the converted absolute target is the same tick as
 * advancing by the encoded delta, the delta is applied directly; otherwise
 * the target is recomputed through the absolute path.
 */
function setRelativeLocation(cursor: TickCursor, rel: Location, ctx: ParseContext): void {
  const here = location(cursor);
  const target = toAbsolute(rel, here);
  const delta = rel.frac ?? ZERO_FRACTION;

  if (target.measure === here.measure && fractionsEqual(absoluteTargetTick(cursor, target), addFractions(cursor.tick, delta))) {
    incTick(cursor, delta);
    setTrack(cursor, (target.track ?? cursorTrack(cursor)) - cursor.trackOffset);
    return;
  }

  setAbsoluteLocation(cursor, target, ctx);
}

function setAbsoluteLocation(cursor: TickCursor, loc: Location, ctx: ParseContext): void {
  const filled = fillLocation(cursor, loc);
  setTrack(cursor, (filled.track ?? 0) - cursor.trackOffset);
  setTick(cursor, absoluteTargetTick(cursor, filled));

  if (!cursor.pasteMode && filled.measure !== currentMeasureIndex(cursor)) {
    addDiagnostic(
      ctx,
      DiagnosticCodes.LOCATION_MEASURE_MISMATCH,
      'warning',
      `Location refers to measure ${filled.measure ?? '?'} but the reader is in measure ${currentMeasureIndex(cursor)}.`
    );
  }
}

/** Stored (offset-free) tick an absolute location resolves to. */
function absoluteTargetTick(cursor: TickCursor, loc: Location): Fraction {
  const tick = subtractFractions(loc.frac ?? ZERO_FRACTION, cursor.tickOffset);
  if (cursor.pasteMode || !cursor.currentMeasure) {
    return tick;
  }
  return addFractions(tick, cursor.currentMeasure.tick);
}
