import {
  DiagnosticCodes,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticSeverity
} from '../core/diagnostics.js';
import { MissingAttributeError, type XmlLocation, type XmlStreamReader } from './xml-stream.js';

/** Supported parser strictness modes. */
export type ParserMode = 'strict' | 'lenient';

/** Mutable diagnostic state shared by reader passes. */
export interface ParseContext {
  mode: ParserMode;
  sourceName?: string;
  /** Added to reported line numbers of embedded sub-documents. */
  lineOffset: number;
  diagnostics: Diagnostic[];
  validationFailure: boolean;
}

/** Create a parser context for one reader session. */
export function createParseContext(mode: ParserMode, sourceName?: string, lineOffset = 0): ParseContext {
  return {
    mode,
    sourceName,
    lineOffset,
    diagnostics: [],
    validationFailure: false
  };
}

/** Position and path of the element a diagnostic refers to. */
export interface DiagnosticAnchor {
  location?: XmlLocation;
  path?: string;
}

/** Record a diagnostic entry, escalating warnings to errors in strict mode. */
export function addDiagnostic(
  ctx: ParseContext,
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  anchor?: DiagnosticAnchor
): void {
  let actualSeverity = severity;
  if (ctx.mode === 'strict' && severity === 'warning') {
    actualSeverity = 'error';
  }

  if (actualSeverity === 'error') {
    ctx.validationFailure = true;
  }

  const location = anchor?.location;
  ctx.diagnostics.push({
    code,
    severity: actualSeverity,
    message,
    source: location
      ? {
          name: ctx.sourceName,
          line: location.line + ctx.lineOffset,
          column: location.column
        }
      : undefined,
    xmlPath: anchor?.path
  });
}

/** Diagnostic anchor for the reader's current element. */
export function readerAnchor(reader: XmlStreamReader): DiagnosticAnchor {
  return { location: reader.location, path: reader.path };
}

/** Report an unrecognized element and consume it wholesale. */
export function skipUnknownElement(ctx: ParseContext, reader: XmlStreamReader): void {
  addDiagnostic(
    ctx,
    DiagnosticCodes.UNKNOWN_ELEMENT,
    'warning',
    `Unknown element <${reader.name}> skipped.`,
    readerAnchor(reader)
  );
  reader.skipCurrentElement();
}

/**
 * Run an element handler positioned on its start token. A missing required
 * attribute or an out-of-range value is reported and the rest of that
 * element is skipped.
 */
export function readGuarded(ctx: ParseContext, reader: XmlStreamReader, handler: () => void): void {
  const depth = reader.depth;
  const anchor = readerAnchor(reader);
  try {
    handler();
  } catch (error) {
    if (error instanceof MissingAttributeError) {
      addDiagnostic(ctx, DiagnosticCodes.MISSING_ATTRIBUTE, 'warning', error.message, {
        location: error.source,
        path: anchor.path
      });
    } else if (error instanceof RangeError) {
      addDiagnostic(ctx, DiagnosticCodes.INVALID_VALUE, 'warning', error.message, anchor);
    } else {
      throw error;
    }
    reader.skipTo(depth);
  }
}
