import type { Fraction } from '../core/fraction.js';
import { createScoreDocument, type ScoreDocument } from '../core/score.js';
import { createConnectorPool, type ConnectorPool } from './connector-info.js';
import { releaseConnectors, type ConnectorTeardown } from './connector-resolver.js';
import { createParseContext, type ParseContext, type ParserMode } from './parse-context.js';
import { clearRegistries, createReaderRegistries, type ReaderRegistries } from './registries.js';
import { createTickCursor, type TickCursor } from './tick-cursor.js';

/**
 * Mutable state of one read pass: cursor, registries and connector pool.
 * Every reader operation takes the session explicitly.
 */
export interface ReaderSession {
  ctx: ParseContext;
  document: ScoreDocument;
  cursor: TickCursor;
  registries: ReaderRegistries;
  connectors: ConnectorPool;
  closed: boolean;
}

export interface ReaderSessionOptions {
  document?: ScoreDocument;
  mode?: ParserMode;
  sourceName?: string;
  lineOffset?: number;
  pasteMode?: boolean;
  tickOffset?: Fraction;
  trackOffset?: number;
}

export function createReaderSession(options: ReaderSessionOptions = {}): ReaderSession {
  return {
    ctx: createParseContext(options.mode ?? 'lenient', options.sourceName, options.lineOffset ?? 0),
    document: options.document ?? createScoreDocument(),
    cursor: createTickCursor({
      pasteMode: options.pasteMode,
      tickOffset: options.tickOffset,
      trackOffset: options.trackOffset
    }),
    registries: createReaderRegistries(),
    connectors: createConnectorPool(),
    closed: false
  };
}

/** End the session: release leftover fragments and clear registries. Idempotent. */
export function closeReaderSession(session: ReaderSession): ConnectorTeardown {
  if (session.closed) {
    return { discarded: 0, preserved: 0 };
  }
  session.closed = true;
  const teardown = releaseConnectors(session);
  clearRegistries(session.registries);
  return teardown;
}
