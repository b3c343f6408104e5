import { pasteFragment as pasteIntoDocument, readScore as readDocument } from '../parser/parse.js';
import type { PasteOptions, PasteResult, ParserResult, ReaderOptions } from '../parser/parse.js';
import type { ScoreDocument } from '../core/score.js';

export type { Diagnostic, DiagnosticCode, DiagnosticSeverity, DiagnosticSource } from '../core/diagnostics.js';
export { DiagnosticCodes, hasErrorDiagnostics } from '../core/diagnostics.js';
export type { Fraction } from '../core/fraction.js';
export { fraction, formatFraction, fractionFromTicks, fractionToTicks, TICKS_PER_QUARTER } from '../core/fraction.js';
export type { Location } from '../core/location.js';
export type {
  Beam,
  ChordElement,
  Color,
  CommittedConnector,
  ConnectorAnchor,
  ConnectorElement,
  ConnectorKind,
  Measure,
  PlacedElement,
  Point,
  PropertyValue,
  Rect,
  RestElement,
  ScoreDocument,
  Size,
  TextElement,
  Tuplet,
  TupletElement
} from '../core/score.js';
export { createScoreDocument } from '../core/score.js';
export type { ConnectorTeardown } from '../parser/connector-resolver.js';
export type { PasteOptions, PasteResult, ParserResult, ReaderOptions };

/** Read `museScore` document text into a new score. */
export function readScore(xmlText: string, options: ReaderOptions = {}): ParserResult {
  return readDocument(xmlText, options);
}

/**
 * Paste a clipboard fragment into `doc` at `options.tick`/`options.track`.
 * The document is updated in place.
 */
export function pasteFragment(doc: ScoreDocument, xmlText: string, options: PasteOptions): PasteResult {
  return pasteIntoDocument(doc, xmlText, options);
}
