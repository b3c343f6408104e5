import { DiagnosticCodes } from '../core/diagnostics.js';
import { addFractions, fractionToTicks } from '../core/fraction.js';
import type { Location } from '../core/location.js';
import { commitConnector, measureTick, type CommittedConnector, type PropertyValue } from '../core/score.js';
import {
  chainFragments,
  chainHead,
  chainTail,
  connectFragments,
  forceConnect,
  INFINITE_DISTANCE,
  isChainFinished,
  orderedConnectionDistance,
  removeChain,
  updateFragment,
  type ConnectorFragment,
  type FragmentHandle
} from './connector-info.js';
import { addDiagnostic } from './parse-context.js';
import { removeSpanner } from './registries.js';
import type { ReaderSession } from './reader-session.js';

/** Outcome of releasing the fragments left at session end. */
export interface ConnectorTeardown {
  discarded: number;
  preserved: number;
}

interface RepairCandidate {
  distance: number;
  from: FragmentHandle;
  to: FragmentHandle;
}

/**
 * Insert a fragment and link it to the first compatible fragment already
 * known, in insertion order. Commits and returns the connector when the
 * link completes its chain.
 */
export function addConnectorInfo(session: ReaderSession, fragment: ConnectorFragment): CommittedConnector | undefined {
  const pool = session.connectors;
  updateFragment(fragment);
  pool.fragments.set(fragment.handle, fragment);

  for (const existing of pool.fragments.values()) {
    if (existing === fragment || !connectFragments(existing, fragment)) {
      continue;
    }
    if (isChainFinished(pool, fragment)) {
      return commitChain(session, fragment);
    }
    return undefined;
  }

  if (isChainFinished(pool, fragment)) {
    return commitChain(session, fragment);
  }
  return undefined;
}

/** Queue a fragment until the element it belongs to has been placed. */
export function deferConnectorInfo(session: ReaderSession, fragment: ConnectorFragment): void {
  session.connectors.pending.push(fragment);
}

/** Merge every queued fragment; returns the number of connectors committed. */
export function checkConnectors(session: ReaderSession): number {
  const pending = session.connectors.pending.splice(0);
  let committed = 0;
  for (const fragment of pending) {
    if (addConnectorInfo(session, fragment)) {
      committed += 1;
    }
  }
  return committed;
}

/** Drop the chain containing `fragment` without committing it. */
export function removeConnector(session: ReaderSession, fragment: ConnectorFragment): void {
  removeChain(session.connectors, fragment);
}

/**
 * Join leftover chains by proximity.
 * Every unordered pair of chains yields at most one candidate, in its cheaper
 * direction; candidates are applied cheapest first and a fragment end is
 * never used twice. Returns the number of connectors committed.
 */
export function reconnectBrokenConnectors(session: ReaderSession): number {
  const pool = session.connectors;
  if (pool.fragments.size === 0) {
    return 0;
  }

  const heads = distinctChainHeads(session);
  const candidates: RepairCandidate[] = [];
  const ticksOf = (loc: Location): number | undefined => locationTicks(session, loc);

  for (let i = 1; i < heads.length; i += 1) {
    for (let j = 0; j < i; j += 1) {
      const first = heads[i];
      const second = heads[j];
      if (!first || !second) {
        continue;
      }
      const candidate = pairCandidate(session, first, second, ticksOf);
      if (candidate) {
        candidates.push(candidate);
      }
    }
  }

  candidates.sort((left, right) => left.distance - right.distance);

  for (const candidate of candidates) {
    const from = pool.fragments.get(candidate.from);
    const to = pool.fragments.get(candidate.to);
    if (!from || !to || from.next !== undefined || to.prev !== undefined) {
      continue;
    }
    if (chainHead(pool, from) === to) {
      continue;
    }
    forceConnect(from, to);
  }

  let reconnected = 0;
  for (const head of distinctChainHeads(session)) {
    if (isChainFinished(session.connectors, head) && commitChain(session, head)) {
      reconnected += 1;
    }
  }

  if (reconnected > 0) {
    addDiagnostic(
      session.ctx,
      DiagnosticCodes.BROKEN_CONNECTORS_RECONNECTED,
      'info',
      `Reconnected ${reconnected} broken connector${reconnected === 1 ? '' : 's'}.`
    );
  }
  return reconnected;
}

/**
 * Release every fragment left at session end. Tuplet payloads stay alive in
 * `preservedConnectors`; every other payload is discarded and counted.
 */
export function releaseConnectors(session: ReaderSession): ConnectorTeardown {
  const pool = session.connectors;
  const leftovers = [...pool.fragments.values(), ...pool.pending];
  pool.fragments.clear();
  pool.pending.length = 0;

  const teardown: ConnectorTeardown = { discarded: 0, preserved: 0 };
  for (const fragment of leftovers) {
    if (fragment.element.kind === 'Tuplet') {
      session.document.preservedConnectors.push(fragment.element);
      teardown.preserved += 1;
    } else {
      teardown.discarded += 1;
    }
  }

  if (teardown.discarded > 0) {
    addDiagnostic(
      session.ctx,
      DiagnosticCodes.UNPAIRED_CONNECTORS_DISCARDED,
      'warning',
      `Discarded ${teardown.discarded} unpaired connector fragment${teardown.discarded === 1 ? '' : 's'}.`
    );
  }
  return teardown;
}

/** Attach the chain containing `fragment` to the document and drop it from the pool. */
function commitChain(session: ReaderSession, fragment: ConnectorFragment): CommittedConnector | undefined {
  const fragments = chainFragments(session.connectors, fragment);
  const head = fragments[0] ?? fragment;

  const properties: Record<string, PropertyValue> = {};
  for (const member of fragments) {
    for (const [key, value] of Object.entries(member.element.properties)) {
      if (!(key in properties)) {
        properties[key] = value;
      }
    }
  }

  const committed = commitConnector(
    session.document,
    {
      element: { kind: head.element.kind, id: head.element.id, properties },
      anchors: fragments.map((member) => member.anchor)
    },
    session.cursor.pasteMode
  );

  removeChain(session.connectors, head);
  for (const member of fragments) {
    removeSpanner(session.registries, member.element);
  }

  if (!committed) {
    addDiagnostic(
      session.ctx,
      DiagnosticCodes.CONNECTOR_ANCHOR_UNRESOLVED,
      'warning',
      `${head.element.kind} connector has an anchor outside the document.`
    );
  }
  return committed;
}

function pairCandidate(
  session: ReaderSession,
  first: ConnectorFragment,
  second: ConnectorFragment,
  ticksOf: (loc: Location) => number | undefined
): RepairCandidate | undefined {
  const pool = session.connectors;
  const firstTail = chainTail(pool, first);
  const secondTail = chainTail(pool, second);

  const forward = orderedConnectionDistance(firstTail, second, ticksOf);
  const backward = orderedConnectionDistance(secondTail, first, ticksOf);

  if (backward < forward) {
    return { distance: backward, from: secondTail.handle, to: first.handle };
  }
  if (forward === INFINITE_DISTANCE) {
    return undefined;
  }
  return { distance: forward, from: firstTail.handle, to: second.handle };
}

function distinctChainHeads(session: ReaderSession): ConnectorFragment[] {
  const heads: ConnectorFragment[] = [];
  const seen = new Set<ConnectorFragment>();
  for (const fragment of session.connectors.fragments.values()) {
    const head = chainHead(session.connectors, fragment);
    if (!seen.has(head)) {
      seen.add(head);
      heads.push(head);
    }
  }
  return heads;
}

/** Absolute tick of a filled location, or `undefined` when it cannot be placed. */
function locationTicks(session: ReaderSession, loc: Location): number | undefined {
  if (loc.frac === undefined) {
    return undefined;
  }
  if (session.cursor.pasteMode) {
    return fractionToTicks(loc.frac);
  }
  const start = loc.measure === undefined ? undefined : measureTick(session.document, loc.measure);
  return start ? fractionToTicks(addFractions(start, loc.frac)) : undefined;
}
