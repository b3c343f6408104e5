import { DiagnosticCodes, type Diagnostic } from '../core/diagnostics.js';
import {
  fractionFromTicks,
  parseFractionText,
  subtractFractions,
  type Fraction
} from '../core/fraction.js';
import { appendMeasure, VOICES_PER_STAFF, type CommittedConnector, type Measure, type ScoreDocument } from '../core/score.js';
import { checkConnectors, reconnectBrokenConnectors, type ConnectorTeardown } from './connector-resolver.js';
import { DEFAULT_MEASURE_LENGTH, IGNORED_SCORE_ELEMENTS } from './parse-constants.js';
import { addDiagnostic, readerAnchor, readGuarded, skipUnknownElement, type ParserMode } from './parse-context.js';
import { reportUnclaimedSpannerEnds } from './parse-spanners.js';
import { readVoiceContent } from './parse-voice.js';
import { closeReaderSession, createReaderSession, type ReaderSession } from './reader-session.js';
import { addUserTextStyle, checkTuplets } from './registries.js';
import { setCurrentMeasure, setTick, setTrack, syncCurrentMeasure } from './tick-cursor.js';
import { XmlParseError, XmlStreamReader } from './xml-stream.js';
import { parseOptionalInt } from './xml-utils.js';

/** Reader entry options for source naming and strictness mode. */
export interface ReaderOptions {
  sourceName?: string;
  mode?: ParserMode;
  /** Added to reported line numbers when the XML is embedded in a larger file. */
  lineOffset?: number;
}

/** Insertion point of a pasted fragment. */
export interface PasteOptions extends ReaderOptions {
  tick: Fraction;
  track: number;
}

/** Reader return envelope with the document and diagnostics. */
export interface ParserResult {
  score?: ScoreDocument;
  diagnostics: Diagnostic[];
  teardown: ConnectorTeardown;
}

export interface PasteResult {
  diagnostics: Diagnostic[];
  /** Connectors committed by this paste. */
  connectors: CommittedConnector[];
  teardown: ConnectorTeardown;
}

const EMPTY_TEARDOWN: ConnectorTeardown = { discarded: 0, preserved: 0 };

/**
 * Read a `museScore` document into a new score.
 * A strict-mode validation failure returns diagnostics only.
 */
export function readScore(xmlText: string, options: ReaderOptions = {}): ParserResult {
  const session = createReaderSession(options);
  const reader = openRoot(session, xmlText, 'museScore');
  if (!reader) {
    return { diagnostics: session.ctx.diagnostics, teardown: EMPTY_TEARDOWN };
  }

  while (reader.readNextStartElement()) {
    if (reader.name === 'Score') {
      readScoreElement(session, reader);
    } else if (IGNORED_SCORE_ELEMENTS.has(reader.name)) {
      reader.skipCurrentElement();
    } else {
      skipUnknownElement(session.ctx, reader);
    }
  }

  const teardown = finishSession(session);
  if (session.ctx.mode === 'strict' && session.ctx.validationFailure) {
    return { diagnostics: session.ctx.diagnostics, teardown };
  }
  return { score: session.document, diagnostics: session.ctx.diagnostics, teardown };
}

/**
 * Read a clipboard fragment (`StaffList`) into an existing document at
 * `options.tick`/`options.track`.
 */
export function pasteFragment(doc: ScoreDocument, xmlText: string, options: PasteOptions): PasteResult {
  const session = createReaderSession({
    document: doc,
    mode: options.mode,
    sourceName: options.sourceName,
    lineOffset: options.lineOffset,
    pasteMode: true
  });
  const reader = openRoot(session, xmlText, 'StaffList');
  if (!reader) {
    return { diagnostics: session.ctx.diagnostics, connectors: [], teardown: EMPTY_TEARDOWN };
  }

  const sourceTick = parseTickAttribute(reader.stringAttribute('tick', '0'));
  const sourceStaff = reader.intAttribute('staff', 0);
  session.cursor.tickOffset = subtractFractions(options.tick, sourceTick);
  session.cursor.trackOffset = options.track - sourceStaff * VOICES_PER_STAFF;

  const before = doc.connectors.length;
  while (reader.readNextStartElement()) {
    if (reader.name === 'Staff') {
      readGuarded(session.ctx, reader, () => readPastedStaff(session, reader, sourceTick));
    } else {
      skipUnknownElement(session.ctx, reader);
    }
  }

  const teardown = finishSession(session);
  return { diagnostics: session.ctx.diagnostics, connectors: doc.connectors.slice(before), teardown };
}

function openRoot(session: ReaderSession, xmlText: string, rootName: string): XmlStreamReader | undefined {
  let reader: XmlStreamReader;
  try {
    reader = XmlStreamReader.fromText(xmlText, session.ctx.sourceName);
  } catch (error) {
    if (error instanceof XmlParseError) {
      addDiagnostic(session.ctx, DiagnosticCodes.XML_NOT_WELL_FORMED, 'error', error.message, { location: error.source });
      return undefined;
    }
    throw error;
  }

  if (!reader.readNextStartElement() || reader.name !== rootName) {
    addDiagnostic(
      session.ctx,
      DiagnosticCodes.UNSUPPORTED_ROOT,
      'error',
      `Unsupported root element '${reader.name}'. Expected '${rootName}'.`,
      readerAnchor(reader)
    );
    return undefined;
  }
  return reader;
}

function readScoreElement(session: ReaderSession, reader: XmlStreamReader): void {
  while (reader.readNextStartElement()) {
    switch (reader.name) {
      case 'TextStyle':
        readGuarded(session.ctx, reader, () => {
          const name = reader.stringAttribute('name');
          reader.skipCurrentElement();
          addUserTextStyle(session.registries, session.ctx, name);
        });
        break;
      case 'Staff':
        readGuarded(session.ctx, reader, () => readStaff(session, reader));
        break;
      default:
        if (IGNORED_SCORE_ELEMENTS.has(reader.name)) {
          reader.skipCurrentElement();
        } else {
          skipUnknownElement(session.ctx, reader);
        }
    }
  }
}

/** Staff 1 creates measures; later staves reuse them by index. */
function readStaff(session: ReaderSession, reader: XmlStreamReader): void {
  const staffId = reader.intAttribute('id');
  let measureIndex = 0;

  while (reader.readNextStartElement()) {
    if (reader.name !== 'Measure') {
      skipUnknownElement(session.ctx, reader);
      continue;
    }
    const index = measureIndex;
    readGuarded(session.ctx, reader, () => readMeasure(session, reader, staffId, index));
    measureIndex += 1;
  }
}

function readMeasure(session: ReaderSession, reader: XmlStreamReader, staffId: number, index: number): void {
  const doc = session.document;
  const measure = doc.measures[index] ?? appendMeasure(doc, measureLength(session, reader, doc.measures.at(-1)));
  const { cursor } = session;
  setCurrentMeasure(cursor, measure);

  let voiceIndex = 0;
  while (reader.readNextStartElement()) {
    if (reader.name !== 'voice') {
      skipUnknownElement(session.ctx, reader);
      continue;
    }
    setTick(cursor, measure.tick);
    setTrack(cursor, (staffId - 1) * VOICES_PER_STAFF + voiceIndex);
    readVoiceContent(session, reader);
    voiceIndex += 1;
  }

  flushTuplets(session);
}

function measureLength(session: ReaderSession, reader: XmlStreamReader, previous: Measure | undefined): Fraction {
  const len = reader.hasAttribute('len') ? reader.stringAttribute('len') : undefined;
  if (len === undefined) {
    return previous?.length ?? DEFAULT_MEASURE_LENGTH;
  }

  const parsed = parseFractionText(len);
  if (!parsed || parsed.numerator <= 0) {
    addDiagnostic(session.ctx, DiagnosticCodes.INVALID_VALUE, 'warning', `Invalid measure length '${len}'.`, readerAnchor(reader));
    return previous?.length ?? DEFAULT_MEASURE_LENGTH;
  }
  return parsed;
}

/** Pasted `Staff` ids are source staff indices; the root `staff` attribute names the first one. */
function readPastedStaff(session: ReaderSession, reader: XmlStreamReader, sourceTick: Fraction): void {
  const staffIndex = reader.intAttribute('id');
  const { cursor } = session;

  let voiceIndex = 0;
  while (reader.readNextStartElement()) {
    if (reader.name !== 'voice') {
      skipUnknownElement(session.ctx, reader);
      continue;
    }
    setTick(cursor, sourceTick);
    setTrack(cursor, staffIndex * VOICES_PER_STAFF + voiceIndex);
    syncCurrentMeasure(cursor, session.document);
    readVoiceContent(session, reader);
    voiceIndex += 1;
  }
}

/** Finalize tuplets read so far and hand the survivors to the document. */
function flushTuplets(session: ReaderSession): void {
  checkTuplets(session.registries, session.ctx);
  session.document.tuplets.push(...session.registries.tuplets.values());
  session.registries.tuplets.clear();
}

/** End-of-input sequence shared by documents and pasted fragments. */
function finishSession(session: ReaderSession): ConnectorTeardown {
  reportUnclaimedSpannerEnds(session);
  checkConnectors(session);
  reconnectBrokenConnectors(session);
  flushTuplets(session);
  session.document.beams.push(...session.registries.beams.values());
  return closeReaderSession(session);
}

/** A tick attribute is `a/b` or an integer tick count. */
function parseTickAttribute(text: string): Fraction {
  if (text.includes('/')) {
    return parseFractionText(text) ?? fractionFromTicks(0);
  }
  return fractionFromTicks(parseOptionalInt(text) ?? 0);
}
