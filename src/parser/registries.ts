import { DiagnosticCodes } from '../core/diagnostics.js';
import type { Fraction } from '../core/fraction.js';
import type { Beam, ConnectorElement, Tuplet } from '../core/score.js';
import { addMissingTupletElements, sanitizeTuplet, sortTupletElements } from '../core/tuplet.js';
import { addDiagnostic, type DiagnosticAnchor, type ParseContext } from './parse-context.js';

/** Forward-reference lookup outcome; callers must handle both arms. */
export type LookupResult<T> = { status: 'resolved'; value: T } | { status: 'unresolved'; id: number };

/** Slots available to user-defined text styles, in allocation order. */
export const USER_TEXT_STYLE_SLOTS = [
  'user1',
  'user2',
  'user3',
  'user4',
  'user5',
  'user6',
  'user7',
  'user8',
  'user9',
  'user10',
  'user11',
  'user12'
] as const;

export type UserTextStyleSlot = (typeof USER_TEXT_STYLE_SLOTS)[number];

/** Registered spanner; ids may repeat across nested contexts. */
export interface SpannerEntry {
  id: number;
  spanner: ConnectorElement;
}

/** End position of an `endSpanner` read before the spanner with `spannerId` was registered. */
export interface SpannerValues {
  spannerId: number;
  tick2: Fraction;
  track2: number;
  source?: DiagnosticAnchor;
}

/** Id-keyed, non-owning lookup tables for one reader session. */
export interface ReaderRegistries {
  beams: Map<number, Beam>;
  tuplets: Map<number, Tuplet>;
  spanners: SpannerEntry[];
  spannerValues: SpannerValues[];
  userTextStyles: Array<{ name: string; slot: UserTextStyleSlot }>;
}

/** Tuplet finalization steps used by `checkTuplets`. */
export interface TupletOps {
  sortElements(tuplet: Tuplet): void;
  sanitize(tuplet: Tuplet): boolean;
  addMissingElements(tuplet: Tuplet): number;
}

export const DEFAULT_TUPLET_OPS: TupletOps = {
  sortElements: sortTupletElements,
  sanitize: sanitizeTuplet,
  addMissingElements: addMissingTupletElements
};

export function createReaderRegistries(): ReaderRegistries {
  return {
    beams: new Map(),
    tuplets: new Map(),
    spanners: [],
    spannerValues: [],
    userTextStyles: []
  };
}

export function addBeam(registries: ReaderRegistries, beam: Beam): void {
  registries.beams.set(beam.id, beam);
}

export function lookupBeam(registries: ReaderRegistries, id: number): LookupResult<Beam> {
  return toLookupResult(registries.beams.get(id), id);
}

export function addTuplet(registries: ReaderRegistries, tuplet: Tuplet): void {
  registries.tuplets.set(tuplet.id, tuplet);
}

export function lookupTuplet(registries: ReaderRegistries, id: number): LookupResult<Tuplet> {
  return toLookupResult(registries.tuplets.get(id), id);
}

/**
 * Finalize tuplets once their content has streamed.
 * Empty tuplets are dropped as corrupt input. Missing elements are only added
 * after every tuplet was sanitized, since repairing a nested tuplet changes
 * what is missing from its parent.
 */
export function checkTuplets(
  registries: ReaderRegistries,
  ctx: ParseContext,
  ops: TupletOps = DEFAULT_TUPLET_OPS
): void {
  for (const [id, tuplet] of registries.tuplets) {
    if (tuplet.elements.length === 0) {
      addDiagnostic(ctx, DiagnosticCodes.EMPTY_TUPLET, 'warning', `Empty tuplet id ${id} dropped; input file corrupted?`);
      registries.tuplets.delete(id);
      continue;
    }

    ops.sortElements(tuplet);
    if (ops.sanitize(tuplet)) {
      addDiagnostic(ctx, DiagnosticCodes.TUPLET_SANITIZED, 'info', `Tuplet id ${id} had inconsistent base length or duration.`);
    }
  }

  for (const tuplet of registries.tuplets.values()) {
    ops.addMissingElements(tuplet);
  }
}

/**
 * Allocate the next user text style slot.
 * Past the last slot the request is ignored and `undefined` is returned.
 */
export function addUserTextStyle(
  registries: ReaderRegistries,
  ctx: ParseContext,
  name: string
): UserTextStyleSlot | undefined {
  const slot = USER_TEXT_STYLE_SLOTS[registries.userTextStyles.length];
  if (!slot) {
    addDiagnostic(
      ctx,
      DiagnosticCodes.USER_TEXT_STYLE_LIMIT,
      'warning',
      `Too many user defined text styles; '${name}' ignored.`
    );
    return undefined;
  }

  registries.userTextStyles.push({ name, slot });
  return slot;
}

export function lookupUserTextStyle(registries: ReaderRegistries, name: string): UserTextStyleSlot | undefined {
  return registries.userTextStyles.find((entry) => entry.name === name)?.slot;
}

export function addSpanner(registries: ReaderRegistries, id: number, spanner: ConnectorElement): void {
  registries.spanners.push({ id, spanner });
}

/** Remove the first entry registered for `spanner`. */
export function removeSpanner(registries: ReaderRegistries, spanner: ConnectorElement): void {
  const index = registries.spanners.findIndex((entry) => entry.spanner === spanner);
  if (index !== -1) {
    registries.spanners.splice(index, 1);
  }
}

/** First spanner registered under `id`. */
export function findSpanner(registries: ReaderRegistries, id: number): LookupResult<ConnectorElement> {
  return toLookupResult(registries.spanners.find((entry) => entry.id === id)?.spanner, id);
}

/** Id under which `spanner` was registered; unregistered spanners are reported, not fatal. */
export function spannerId(
  registries: ReaderRegistries,
  ctx: ParseContext,
  spanner: ConnectorElement
): number | undefined {
  const entry = registries.spanners.find((candidate) => candidate.spanner === spanner);
  if (!entry) {
    addDiagnostic(ctx, DiagnosticCodes.SPANNER_NOT_REGISTERED, 'info', `${spanner.kind} spanner is not registered.`);
    return undefined;
  }
  return entry.id;
}

export function addSpannerValues(registries: ReaderRegistries, values: SpannerValues): void {
  registries.spannerValues.push(values);
}

/** First end position recorded for `id`. */
export function spannerValues(registries: ReaderRegistries, id: number): LookupResult<SpannerValues> {
  return toLookupResult(
    registries.spannerValues.find((values) => values.spannerId === id),
    id
  );
}

export function removeSpannerValues(registries: ReaderRegistries, values: SpannerValues): void {
  const index = registries.spannerValues.indexOf(values);
  if (index !== -1) {
    registries.spannerValues.splice(index, 1);
  }
}

/** Drop every registry entry at session end. */
export function clearRegistries(registries: ReaderRegistries): void {
  registries.beams.clear();
  registries.tuplets.clear();
  registries.spanners.length = 0;
  registries.spannerValues.length = 0;
  registries.userTextStyles.length = 0;
}

function toLookupResult<T>(value: T | undefined, id: number): LookupResult<T> {
  return value === undefined ? { status: 'unresolved', id } : { status: 'resolved', value };
}
