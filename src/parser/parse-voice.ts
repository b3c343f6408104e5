import { DiagnosticCodes } from '../core/diagnostics.js';
import { fraction, multiplyFractions, subtractFractions, type Fraction } from '../core/fraction.js';
import { placeElement, type PlacedElement, type Tuplet } from '../core/score.js';
import { tupletRealDuration } from '../core/tuplet.js';
import { checkConnectors } from './connector-resolver.js';
import { DEFAULT_TUPLET_BASE, DURATION_TYPES, MAX_DOTS } from './parse-constants.js';
import {
  addDiagnostic,
  readerAnchor,
  readGuarded,
  skipUnknownElement,
  type DiagnosticAnchor
} from './parse-context.js';
import { readLocation } from './parse-location.js';
import { readEndSpanner, readSpanner } from './parse-spanners.js';
import type { ReaderSession } from './reader-session.js';
import { addBeam, addTuplet, lookupBeam, lookupTuplet, lookupUserTextStyle } from './registries.js';
import { cursorTick, cursorTrack, incTick, setLocation, setTick } from './tick-cursor.js';
import { readFraction, readInt } from './xml-utils.js';
import type { XmlStreamReader } from './xml-stream.js';

/** Read the content of one `<voice>` at the current cursor position. */
export function readVoiceContent(session: ReaderSession, reader: XmlStreamReader): void {
  while (reader.readNextStartElement()) {
    readGuarded(session.ctx, reader, () => readVoiceElement(session, reader));
  }
}

function readVoiceElement(session: ReaderSession, reader: XmlStreamReader): void {
  switch (reader.name) {
    case 'Chord':
      readChordRest(session, reader, 'chord');
      return;
    case 'Rest':
      readChordRest(session, reader, 'rest');
      return;
    case 'Tuplet':
      readTupletDefinition(session, reader);
      return;
    case 'endTuplet':
      reader.skipCurrentElement();
      return;
    case 'Beam':
      readBeamDefinition(session, reader);
      return;
    case 'location':
      setLocation(session.cursor, readLocation(session.ctx, reader), session.ctx);
      return;
    case 'tick':
      setTick(session.cursor, readFraction(reader));
      return;
    case 'StaffText':
      readStaffText(session, reader);
      return;
    case 'Spanner':
      readSpanner(session, reader, { deferred: false });
      return;
    case 'endSpanner':
      readEndSpanner(session, reader, { deferred: false });
      return;
    default:
      skipUnknownElement(session.ctx, reader);
  }
}

/**
 * Read a chord or rest, place it, merge the connector fragments it carried,
 * and advance the cursor by its actual duration.
 */
function readChordRest(session: ReaderSession, reader: XmlStreamReader, kind: PlacedElement['kind']): void {
  const { ctx, cursor } = session;
  const anchor = readerAnchor(reader);
  const pitches: number[] = [];
  let durationType: string | undefined;
  let duration: Fraction | undefined;
  let dots = 0;
  let beamId: number | undefined;
  let tupletId: number | undefined;

  while (reader.readNextStartElement()) {
    switch (reader.name) {
      case 'durationType':
        durationType = reader.readElementText().trim();
        break;
      case 'dots':
        dots = readInt(reader);
        break;
      case 'duration':
        duration = readFraction(reader);
        break;
      case 'Beam':
        beamId = readInt(reader);
        break;
      case 'Tuplet':
        tupletId = readInt(reader);
        break;
      case 'Note':
        readNote(session, reader, pitches);
        break;
      default:
        readGuarded(ctx, reader, () => readAttachedConnector(session, reader));
    }
  }

  const notated = duration ?? notatedDuration(session, durationType, dots, anchor);
  const tick = cursorTick(cursor);
  const track = cursorTrack(cursor);
  const tuplet = tupletId === undefined ? undefined : resolveTuplet(session, tupletId, anchor);
  const actualDuration = tuplet ? tupletRealDuration(tuplet, notated) : notated;
  tuplet?.elements.push({ kind, tick, duration: notated });

  const base = {
    tick,
    track,
    duration: notated,
    actualDuration,
    beamId: beamId === undefined ? undefined : resolveBeamId(session, beamId, anchor),
    tupletId: tuplet?.id
  };
  const element: PlacedElement = kind === 'chord' ? { ...base, kind, pitches } : { ...base, kind };

  if (!placeElement(session.document, element)) {
    addDiagnostic(
      ctx,
      DiagnosticCodes.ELEMENT_OUTSIDE_MEASURE,
      'warning',
      `${kind === 'chord' ? 'Chord' : 'Rest'} at tick ${tick.numerator}/${tick.denominator} lies outside every measure.`,
      anchor
    );
  }

  checkConnectors(session);
  incTick(cursor, actualDuration);
}

function readNote(session: ReaderSession, reader: XmlStreamReader, pitches: number[]): void {
  while (reader.readNextStartElement()) {
    if (reader.name === 'pitch') {
      pitches.push(readInt(reader));
      continue;
    }
    readGuarded(session.ctx, reader, () => readAttachedConnector(session, reader));
  }
}

/** Spanner fragments inside a chord wait until the chord is placed. */
function readAttachedConnector(session: ReaderSession, reader: XmlStreamReader): void {
  switch (reader.name) {
    case 'Spanner':
      readSpanner(session, reader, { deferred: true });
      return;
    case 'endSpanner':
      readEndSpanner(session, reader, { deferred: true });
      return;
    default:
      skipUnknownElement(session.ctx, reader);
  }
}

function notatedDuration(
  session: ReaderSession,
  durationType: string | undefined,
  dots: number,
  anchor: DiagnosticAnchor
): Fraction {
  if (durationType === 'measure') {
    return session.cursor.currentMeasure?.length ?? fraction(1, 1);
  }

  const base = durationType === undefined ? undefined : DURATION_TYPES[durationType];
  if (!base) {
    addDiagnostic(
      session.ctx,
      DiagnosticCodes.INVALID_VALUE,
      'warning',
      `Unknown duration type '${durationType ?? ''}'; using a quarter.`,
      anchor
    );
    return fraction(1, 4);
  }

  let dotCount = dots;
  if (dots < 0 || dots > MAX_DOTS) {
    dotCount = Math.min(Math.max(dots, 0), MAX_DOTS);
    addDiagnostic(
      session.ctx,
      DiagnosticCodes.INVALID_VALUE,
      'warning',
      `Dot count ${dots} is outside 0..${MAX_DOTS}; using ${dotCount}.`,
      anchor
    );
  }

  // Each dot adds half of the previous value: base * (2 - 1/2^dots).
  const scale = 2 ** dotCount;
  return multiplyFractions(base, subtractFractions(fraction(2), fraction(1, scale)));
}

function resolveTuplet(
  session: ReaderSession,
  id: number,
  anchor: DiagnosticAnchor
): Tuplet | undefined {
  const result = lookupTuplet(session.registries, id);
  if (result.status === 'resolved') {
    return result.value;
  }
  addDiagnostic(session.ctx, DiagnosticCodes.UNRESOLVED_TUPLET, 'warning', `Tuplet id ${result.id} is not defined.`, anchor);
  return undefined;
}

function resolveBeamId(
  session: ReaderSession,
  id: number,
  anchor: DiagnosticAnchor
): number | undefined {
  const result = lookupBeam(session.registries, id);
  if (result.status === 'resolved') {
    return result.value.id;
  }
  addDiagnostic(session.ctx, DiagnosticCodes.UNRESOLVED_BEAM, 'warning', `Beam id ${result.id} is not defined.`, anchor);
  return undefined;
}

/** `<Tuplet id>` with `normalNotes`, `actualNotes`, `baseNote` and an optional parent `Tuplet`. */
function readTupletDefinition(session: ReaderSession, reader: XmlStreamReader): void {
  const id = reader.intAttribute('id');
  const anchor = readerAnchor(reader);
  let normal = 2;
  let actual = 3;
  let baseLength = DEFAULT_TUPLET_BASE;
  let parentId: number | undefined;

  while (reader.readNextStartElement()) {
    switch (reader.name) {
      case 'normalNotes':
        normal = readInt(reader, normal);
        break;
      case 'actualNotes':
        actual = readInt(reader, actual);
        break;
      case 'baseNote': {
        const name = reader.readElementText().trim();
        baseLength = DURATION_TYPES[name] ?? baseLength;
        break;
      }
      case 'Tuplet':
        parentId = readInt(reader);
        break;
      default:
        skipUnknownElement(session.ctx, reader);
    }
  }

  if (normal <= 0 || actual <= 0) {
    addDiagnostic(session.ctx, DiagnosticCodes.INVALID_VALUE, 'warning', `Tuplet id ${id} has a non-positive ratio.`, anchor);
    return;
  }

  const tuplet: Tuplet = {
    id,
    track: cursorTrack(session.cursor),
    tick: cursorTick(session.cursor),
    actual,
    normal,
    baseLength,
    ticks: multiplyFractions(baseLength, fraction(normal)),
    elements: []
  };

  if (parentId !== undefined) {
    tuplet.parent = resolveTuplet(session, parentId, anchor);
    tuplet.parent?.elements.push({ kind: 'tuplet', tick: tuplet.tick, tuplet });
  }
  addTuplet(session.registries, tuplet);
}

function readBeamDefinition(session: ReaderSession, reader: XmlStreamReader): void {
  const id = reader.intAttribute('id');
  reader.skipCurrentElement();
  addBeam(session.registries, { id, track: cursorTrack(session.cursor), tick: cursorTick(session.cursor) });
}

/** `<StaffText style="name">rich text</StaffText>`; the style must be a registered user style. */
function readStaffText(session: ReaderSession, reader: XmlStreamReader): void {
  const styleName = reader.stringAttribute('style', '');
  const anchor = readerAnchor(reader);
  const text = reader.readXml();

  let style = 'default';
  if (styleName.length > 0) {
    const slot = lookupUserTextStyle(session.registries, styleName);
    if (slot) {
      style = slot;
    } else {
      addDiagnostic(
        session.ctx,
        DiagnosticCodes.UNKNOWN_TEXT_STYLE,
        'warning',
        `Text style '${styleName}' is not defined; using the default style.`,
        anchor
      );
    }
  }

  session.document.texts.push({
    tick: cursorTick(session.cursor),
    track: cursorTrack(session.cursor),
    style,
    text
  });
}
