import { TICKS_PER_WHOLE } from '../core/fraction.js';
import { compareLocations, locationsEqual, toAbsolute, type Location } from '../core/location.js';
import type { ConnectorElement } from '../core/score.js';

/** Stable reference to a fragment inside a `ConnectorPool`. */
export type FragmentHandle = number;

/** Position of a fragment within its connector chain. */
export type ConnectorRole = 'start' | 'middle' | 'end';

/** Added per track of separation when ranking repair candidates. */
export const TRACK_DISTANCE_WEIGHT = TICKS_PER_WHOLE;

/** Distance of pairs that must never be joined. */
export const INFINITE_DISTANCE = Number.POSITIVE_INFINITY;

/**
 * One observed piece of a connector.
 * `prev`/`next` are handles into the owning pool, never owning references.
 */
export interface ConnectorFragment {
  handle: FragmentHandle;
  element: ConnectorElement;
  /** Where this fragment was seen, filled from the reader cursor. */
  anchor: Location;
  /** Where the previous fragment is expected; absolute once updated. */
  prevLocation?: Location;
  nextLocation?: Location;
  expectsPrev: boolean;
  expectsNext: boolean;
  prev?: FragmentHandle;
  next?: FragmentHandle;
  updated: boolean;
}

/**
 * Owns every fragment of a reader session.
 * `fragments` keeps insertion order, which decides first-match resolution.
 */
export interface ConnectorPool {
  fragments: Map<FragmentHandle, ConnectorFragment>;
  /** Fragments seen inside a chord, merged once the chord is placed. */
  pending: ConnectorFragment[];
  nextHandle: FragmentHandle;
}

export interface FragmentInit {
  element: ConnectorElement;
  anchor: Location;
  role?: ConnectorRole;
  prevLocation?: Location;
  nextLocation?: Location;
}

export function createConnectorPool(): ConnectorPool {
  return { fragments: new Map(), pending: [], nextHandle: 1 };
}

/**
 * Create a fragment owned by `pool` (not yet inserted).
 * Without an explicit role, the presence of `prevLocation`/`nextLocation`
 * decides which neighbours the fragment expects.
 */
export function createConnectorFragment(pool: ConnectorPool, init: FragmentInit): ConnectorFragment {
  const handle = pool.nextHandle;
  pool.nextHandle += 1;

  const role = init.role;
  return {
    handle,
    element: init.element,
    anchor: init.anchor,
    prevLocation: init.prevLocation,
    nextLocation: init.nextLocation,
    expectsPrev: role ? role !== 'start' : init.prevLocation !== undefined,
    expectsNext: role ? role !== 'end' : init.nextLocation !== undefined,
    updated: false
  };
}

/** Convert relative neighbour locations to absolute ones, once. */
export function updateFragment(fragment: ConnectorFragment): void {
  if (fragment.updated) {
    return;
  }
  if (fragment.prevLocation) {
    fragment.prevLocation = toAbsolute(fragment.prevLocation, fragment.anchor);
  }
  if (fragment.nextLocation) {
    fragment.nextLocation = toAbsolute(fragment.nextLocation, fragment.anchor);
  }
  fragment.updated = true;
}

/** Whether `after` may directly follow `before` in one chain. */
export function canLink(before: ConnectorFragment, after: ConnectorFragment): boolean {
  if (before === after || before.element.kind !== after.element.kind) {
    return false;
  }
  if (!before.expectsNext || before.next !== undefined || !after.expectsPrev || after.prev !== undefined) {
    return false;
  }
  if (before.nextLocation && !locationsEqual(before.nextLocation, after.anchor)) {
    return false;
  }
  if (after.prevLocation && !locationsEqual(after.prevLocation, before.anchor)) {
    return false;
  }

  const beforeId = before.element.id;
  const afterId = after.element.id;
  const idsKnown = beforeId !== undefined && afterId !== undefined;
  if (idsKnown && beforeId !== afterId) {
    return false;
  }

  const explicit = before.nextLocation !== undefined || after.prevLocation !== undefined;
  if (!explicit && !idsKnown) {
    return false;
  }

  return compareLocations(before.anchor, after.anchor) <= 0;
}

/** Link `before` -> `after` without compatibility checks. */
export function forceConnect(before: ConnectorFragment, after: ConnectorFragment): void {
  before.next = after.handle;
  after.prev = before.handle;
}

/** Try to link two fragments in either direction; returns true on success. */
export function connectFragments(existing: ConnectorFragment, incoming: ConnectorFragment): boolean {
  if (canLink(existing, incoming)) {
    forceConnect(existing, incoming);
    return true;
  }
  if (canLink(incoming, existing)) {
    forceConnect(incoming, existing);
    return true;
  }
  return false;
}

/** First fragment of the chain containing `fragment`. */
export function chainHead(pool: ConnectorPool, fragment: ConnectorFragment): ConnectorFragment {
  return walk(pool, fragment, 'prev').at(-1) ?? fragment;
}

/** Last fragment of the chain containing `fragment`. */
export function chainTail(pool: ConnectorPool, fragment: ConnectorFragment): ConnectorFragment {
  return walk(pool, fragment, 'next').at(-1) ?? fragment;
}

/** Fragments of the chain containing `fragment`, head first. */
export function chainFragments(pool: ConnectorPool, fragment: ConnectorFragment): ConnectorFragment[] {
  return walk(pool, chainHead(pool, fragment), 'next');
}

/** A chain is finished when nothing is missing at either end. */
export function isChainFinished(pool: ConnectorPool, fragment: ConnectorFragment): boolean {
  const head = chainHead(pool, fragment);
  const tail = chainTail(pool, fragment);
  return head.prev === undefined && !head.expectsPrev && tail.next === undefined && !tail.expectsNext;
}

/**
 * Repair distance from the tail `from` to the head `to`, in ticks.
 * `ticksOf` resolves a location to absolute ticks.
 */
export function orderedConnectionDistance(
  from: ConnectorFragment,
  to: ConnectorFragment,
  ticksOf: (loc: Location) => number | undefined
): number {
  if (from.element.kind !== to.element.kind) {
    return INFINITE_DISTANCE;
  }
  if (!from.expectsNext || from.next !== undefined || !to.expectsPrev || to.prev !== undefined) {
    return INFINITE_DISTANCE;
  }

  const fromTick = ticksOf(from.anchor);
  const toTick = ticksOf(to.anchor);
  if (fromTick === undefined || toTick === undefined || toTick < fromTick) {
    return INFINITE_DISTANCE;
  }

  if (!from.nextLocation && !to.prevLocation) {
    return toTick - fromTick + trackDistance(from.anchor, to.anchor);
  }

  let distance = 0;
  if (from.nextLocation) {
    const expected = ticksOf(from.nextLocation);
    if (expected === undefined) {
      return INFINITE_DISTANCE;
    }
    distance += Math.abs(expected - toTick) + trackDistance(from.nextLocation, to.anchor);
  }
  if (to.prevLocation) {
    const expected = ticksOf(to.prevLocation);
    if (expected === undefined) {
      return INFINITE_DISTANCE;
    }
    distance += Math.abs(expected - fromTick) + trackDistance(to.prevLocation, from.anchor);
  }
  return distance;
}

/** Remove the whole chain containing `fragment` from the pool. */
export function removeChain(pool: ConnectorPool, fragment: ConnectorFragment): ConnectorFragment[] {
  const removed = chainFragments(pool, fragment);
  for (const member of removed) {
    pool.fragments.delete(member.handle);
  }
  return removed;
}

function trackDistance(left: Location, right: Location): number {
  return TRACK_DISTANCE_WEIGHT * Math.abs((left.track ?? 0) - (right.track ?? 0));
}

/** Follow `direction` links from `start`; stops at dangling handles and cycles. */
function walk(pool: ConnectorPool, start: ConnectorFragment, direction: 'prev' | 'next'): ConnectorFragment[] {
  const visited = new Set<FragmentHandle>([start.handle]);
  const out = [start];
  let handle = start[direction];
  while (handle !== undefined && !visited.has(handle)) {
    const current = pool.fragments.get(handle);
    if (!current) {
      break;
    }
    visited.add(handle);
    out.push(current);
    handle = current[direction];
  }
  return out;
}
