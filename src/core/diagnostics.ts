/** Severity classes used by reader diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Stable diagnostic codes emitted by the reader. */
export const DiagnosticCodes = {
  XML_NOT_WELL_FORMED: 'XML_NOT_WELL_FORMED',
  UNSUPPORTED_ROOT: 'UNSUPPORTED_ROOT',
  UNKNOWN_ELEMENT: 'UNKNOWN_ELEMENT',
  MISSING_ATTRIBUTE: 'MISSING_ATTRIBUTE',
  INVALID_VALUE: 'INVALID_VALUE',
  ELEMENT_OUTSIDE_MEASURE: 'ELEMENT_OUTSIDE_MEASURE',
  EMPTY_TUPLET: 'EMPTY_TUPLET',
  TUPLET_SANITIZED: 'TUPLET_SANITIZED',
  USER_TEXT_STYLE_LIMIT: 'USER_TEXT_STYLE_LIMIT',
  UNKNOWN_TEXT_STYLE: 'UNKNOWN_TEXT_STYLE',
  SPANNER_NOT_REGISTERED: 'SPANNER_NOT_REGISTERED',
  UNRESOLVED_BEAM: 'UNRESOLVED_BEAM',
  UNRESOLVED_TUPLET: 'UNRESOLVED_TUPLET',
  UNRESOLVED_SPANNER_END: 'UNRESOLVED_SPANNER_END',
  LOCATION_MEASURE_MISMATCH: 'LOCATION_MEASURE_MISMATCH',
  CONNECTOR_ANCHOR_UNRESOLVED: 'CONNECTOR_ANCHOR_UNRESOLVED',
  BROKEN_CONNECTORS_RECONNECTED: 'BROKEN_CONNECTORS_RECONNECTED',
  UNPAIRED_CONNECTORS_DISCARDED: 'UNPAIRED_CONNECTORS_DISCARDED'
} as const;

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes];

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical diagnostic object emitted by all public API operations. */
export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  xmlPath?: string;
}

/** True when any diagnostic has error severity. */
export function hasErrorDiagnostics(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}
