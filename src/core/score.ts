import {
  addFractions,
  compareFractions,
  ZERO_FRACTION,
  type Fraction
} from './fraction.js';
import type { Location } from './location.js';

/** Number of voices (tracks) per staff. */
export const VOICES_PER_STAFF = 4;

/** Connector element families that are streamed as start/end fragments. */
export type ConnectorKind =
  | 'Slur'
  | 'Tie'
  | 'HairPin'
  | 'Ottava'
  | 'Pedal'
  | 'Volta'
  | 'TextLine'
  | 'Trill'
  | 'Tuplet';

export const CONNECTOR_KINDS: readonly ConnectorKind[] = [
  'Slur',
  'Tie',
  'HairPin',
  'Ottava',
  'Pedal',
  'Volta',
  'TextLine',
  'Trill',
  'Tuplet'
];

/** Narrow arbitrary element/attribute text to a connector kind. */
export function isConnectorKind(value: string | undefined): value is ConnectorKind {
  return value !== undefined && (CONNECTOR_KINDS as readonly string[]).includes(value);
}

export interface Point {
  x: number;
  y: number;
}

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Point, Size {}

/** Decoded property value carried by connector bodies. */
export type PropertyValue = string | number | boolean | Point | Color | Size | Rect;

/** Connector payload carried by fragments until its chain is committed. */
export interface ConnectorElement {
  kind: ConnectorKind;
  id?: number;
  properties: Record<string, PropertyValue>;
}

/** Connector chain ready to be attached to a document. */
export interface ResolvedConnector {
  element: ConnectorElement;
  anchors: Location[];
}

/** Anchor of a committed connector, in absolute ticks. */
export interface ConnectorAnchor {
  track: number;
  tick: Fraction;
}

/** Connector attached to the document after its chain finished. */
export interface CommittedConnector {
  kind: ConnectorKind;
  id?: number;
  properties: Record<string, PropertyValue>;
  anchors: ConnectorAnchor[];
  pasted: boolean;
}

/** Shared timing fields of placed rhythmic elements. */
interface PlacedBase {
  tick: Fraction;
  track: number;
  duration: Fraction;
  actualDuration: Fraction;
  beamId?: number;
  tupletId?: number;
}

export interface ChordElement extends PlacedBase {
  kind: 'chord';
  pitches: number[];
}

export interface RestElement extends PlacedBase {
  kind: 'rest';
}

export type PlacedElement = ChordElement | RestElement;

/** Structural measure: start tick, nominal length, and placed content. */
export interface Measure {
  index: number;
  tick: Fraction;
  length: Fraction;
  elements: PlacedElement[];
}

export interface Beam {
  id: number;
  track: number;
  tick: Fraction;
}

/** Member of a tuplet in document order. */
export type TupletElement =
  | {
      kind: 'chord' | 'rest';
      tick: Fraction;
      duration: Fraction;
      generated?: boolean;
    }
  | {
      kind: 'tuplet';
      tick: Fraction;
      tuplet: Tuplet;
    };

/** Tuplet group: `actual` notes in the time of `normal` notes of `baseLength`. */
export interface Tuplet {
  id: number;
  track: number;
  tick: Fraction;
  actual: number;
  normal: number;
  baseLength: Fraction;
  /** Span of the group in the parent's notated time (real time at top level): `baseLength × normal`. */
  ticks: Fraction;
  elements: TupletElement[];
  /** Enclosing tuplet of a nested group. */
  parent?: Tuplet;
}

/** Text element placed with a user text style. */
export interface TextElement {
  tick: Fraction;
  track: number;
  style: string;
  text: string;
}

/** In-memory score being built by the reader. */
export interface ScoreDocument {
  measures: Measure[];
  tuplets: Tuplet[];
  beams: Beam[];
  connectors: CommittedConnector[];
  texts: TextElement[];
  preservedConnectors: ConnectorElement[];
}

export function createScoreDocument(): ScoreDocument {
  return {
    measures: [],
    tuplets: [],
    beams: [],
    connectors: [],
    texts: [],
    preservedConnectors: []
  };
}

/** Append a measure directly after the last one. */
export function appendMeasure(doc: ScoreDocument, length: Fraction): Measure {
  const last = doc.measures.at(-1);
  const measure: Measure = {
    index: doc.measures.length,
    tick: last ? addFractions(last.tick, last.length) : ZERO_FRACTION,
    length,
    elements: []
  };
  doc.measures.push(measure);
  return measure;
}

/** Structural measure containing `tick`, if any. */
export function currentMeasureAt(doc: ScoreDocument, tick: Fraction): Measure | undefined {
  return doc.measures.find(
    (measure) =>
      compareFractions(tick, measure.tick) >= 0 &&
      compareFractions(tick, addFractions(measure.tick, measure.length)) < 0
  );
}

/** Start tick of the measure at `index`, if it exists. */
export function measureTick(doc: ScoreDocument, index: number): Fraction | undefined {
  return doc.measures[index]?.tick;
}

/** Place a rhythmic element into the measure containing its tick. */
export function placeElement(doc: ScoreDocument, element: PlacedElement): Measure | undefined {
  const measure = currentMeasureAt(doc, element.tick);
  measure?.elements.push(element);
  return measure;
}

/**
 * Attach a finished connector chain.
 * Pasted anchors carry absolute fractions (measure 0); otherwise `frac` is
 * relative to the start of measure `measure`.
 */
export function commitConnector(
  doc: ScoreDocument,
  connector: ResolvedConnector,
  pasteMode: boolean
): CommittedConnector | undefined {
  const anchors: ConnectorAnchor[] = [];
  for (const loc of connector.anchors) {
    const anchor = resolveAnchor(doc, loc, pasteMode);
    if (!anchor) {
      return undefined;
    }
    anchors.push(anchor);
  }

  const committed: CommittedConnector = {
    kind: connector.element.kind,
    id: connector.element.id,
    properties: connector.element.properties,
    anchors,
    pasted: pasteMode
  };
  doc.connectors.push(committed);
  return committed;
}

/** Resolve a filled location to an absolute anchor. */
export function resolveAnchor(doc: ScoreDocument, loc: Location, pasteMode: boolean): ConnectorAnchor | undefined {
  if (loc.track === undefined || loc.frac === undefined) {
    return undefined;
  }

  if (pasteMode) {
    return { track: loc.track, tick: loc.frac };
  }

  const start = loc.measure === undefined ? undefined : measureTick(doc, loc.measure);
  if (!start) {
    return undefined;
  }

  return { track: loc.track, tick: addFractions(start, loc.frac) };
}
