import { DiagnosticCodes } from '../core/diagnostics.js';
import { subtractFractions } from '../core/fraction.js';
import type { Location } from '../core/location.js';
import {
  currentMeasureAt,
  isConnectorKind,
  type ConnectorElement,
  type ConnectorKind,
  type PropertyValue
} from '../core/score.js';
import { createConnectorFragment, type ConnectorFragment } from './connector-info.js';
import { addConnectorInfo, deferConnectorInfo } from './connector-resolver.js';
import { addDiagnostic, readerAnchor, skipUnknownElement } from './parse-context.js';
import { readLocationWrapper } from './parse-location.js';
import type { ReaderSession } from './reader-session.js';
import {
  addSpanner,
  addSpannerValues,
  findSpanner,
  removeSpannerValues,
  spannerValues,
  type SpannerValues
} from './registries.js';
import { cursorTick, cursorTrack, location } from './tick-cursor.js';
import { readBool, readColor, readDouble, readInt, readPoint, readRect, readScale, readSize } from './xml-utils.js';
import type { XmlStreamReader } from './xml-stream.js';

/** Whether fragments go straight to the resolver or wait for their chord. */
export interface SpannerReadOptions {
  deferred: boolean;
}

type PropertyReader = (reader: XmlStreamReader) => PropertyValue;

const readText: PropertyReader = (reader) => reader.readElementText().trim();

const SPANNER_PROPERTIES: Readonly<Record<string, PropertyReader>> = {
  subtype: readText,
  placement: readText,
  lineStyle: readText,
  direction: readText,
  beginText: (reader) => reader.readXml(),
  continueText: (reader) => reader.readXml(),
  endText: (reader) => reader.readXml(),
  lineWidth: (reader) => readDouble(reader, 0, 100),
  veloChange: (reader) => readInt(reader),
  visible: readBool,
  diagonal: readBool,
  offset: readPoint,
  color: readColor,
  size: readSize,
  scale: readScale,
  bbox: readRect
};

/**
 * Read a `<Spanner type="..." [id="..."]>` fragment at the cursor position.
 * Properties may sit directly in the fragment or in a body element named
 * after the type (`<Spanner type="Slur"><Slur>...</Slur></Spanner>`).
 * With `<next>`/`<prev>` the fragment links by location; without them it is
 * an id-keyed start and is registered for a later `<endSpanner>`.
 */
export function readSpanner(session: ReaderSession, reader: XmlStreamReader, options: SpannerReadOptions): void {
  const kind = readKind(session, reader);
  if (!kind) {
    return;
  }

  const id = reader.hasAttribute('id') ? reader.intAttribute('id') : undefined;
  const anchor = location(session.cursor);
  const properties: Record<string, PropertyValue> = {};
  let prevLocation: Location | undefined;
  let nextLocation: Location | undefined;

  while (reader.readNextStartElement()) {
    const name = reader.name;
    if (name === 'next') {
      nextLocation = readLocationWrapper(session.ctx, reader);
      continue;
    }
    if (name === 'prev') {
      prevLocation = readLocationWrapper(session.ctx, reader);
      continue;
    }

    if (name === kind) {
      while (reader.readNextStartElement()) {
        readProperty(session, reader, properties);
      }
      continue;
    }
    readProperty(session, reader, properties);
  }

  const element: ConnectorElement = { kind, id, properties };
  let fragment: ConnectorFragment;

  if (prevLocation || nextLocation) {
    fragment = createConnectorFragment(session.connectors, { element, anchor, prevLocation, nextLocation });
  } else {
    if (id === undefined) {
      addDiagnostic(
        session.ctx,
        DiagnosticCodes.INVALID_VALUE,
        'warning',
        `${kind} spanner has neither an id nor a linked location; dropped.`
      );
      return;
    }
    addSpanner(session.registries, id, element);
    fragment = createConnectorFragment(session.connectors, { element, anchor, role: 'start' });
  }

  submit(session, fragment, options);
  if (id !== undefined && !prevLocation && !nextLocation) {
    submitRecordedEnd(session, element, id, options);
  }
}

/**
 * Read an `<endSpanner id="..." [type="..."]>` closing an id-keyed spanner.
 * Without `type` the kind comes from the registered start; when that start
 * has not been read yet, the end position is recorded for it.
 */
export function readEndSpanner(session: ReaderSession, reader: XmlStreamReader, options: SpannerReadOptions): void {
  const id = reader.intAttribute('id');
  const anchorInfo = readerAnchor(reader);
  const typeName = reader.hasAttribute('type') ? reader.stringAttribute('type') : undefined;
  reader.skipCurrentElement();

  let kind: ConnectorKind | undefined = isConnectorKind(typeName) ? typeName : undefined;
  if (!kind) {
    const start = findSpanner(session.registries, id);
    if (start.status === 'unresolved') {
      addSpannerValues(session.registries, {
        spannerId: id,
        tick2: cursorTick(session.cursor),
        track2: cursorTrack(session.cursor),
        source: anchorInfo
      });
      return;
    }
    kind = start.value.kind;
  }

  const fragment = createConnectorFragment(session.connectors, {
    element: { kind, id, properties: {} },
    anchor: location(session.cursor),
    role: 'end'
  });
  submit(session, fragment, options);
}

/** Close a start whose `endSpanner` was read earlier. */
function submitRecordedEnd(
  session: ReaderSession,
  start: ConnectorElement,
  id: number,
  options: SpannerReadOptions
): void {
  const recorded = spannerValues(session.registries, id);
  if (recorded.status === 'unresolved') {
    return;
  }
  removeSpannerValues(session.registries, recorded.value);

  const fragment = createConnectorFragment(session.connectors, {
    element: { kind: start.kind, id, properties: {} },
    anchor: recordedEndLocation(session, recorded.value),
    role: 'end'
  });
  submit(session, fragment, options);
}

/** Location of a recorded end, in the same frame as `location(cursor)`. */
function recordedEndLocation(session: ReaderSession, values: SpannerValues): Location {
  if (session.cursor.pasteMode) {
    return { relative: false, track: values.track2, frac: values.tick2, measure: 0 };
  }
  const measure = currentMeasureAt(session.document, values.tick2);
  return {
    relative: false,
    track: values.track2,
    frac: measure ? subtractFractions(values.tick2, measure.tick) : values.tick2,
    measure: measure?.index ?? 0
  };
}

/** Report end positions no start ever claimed. */
export function reportUnclaimedSpannerEnds(session: ReaderSession): void {
  for (const values of session.registries.spannerValues) {
    addDiagnostic(
      session.ctx,
      DiagnosticCodes.UNRESOLVED_SPANNER_END,
      'warning',
      `endSpanner id ${values.spannerId} has no matching spanner.`,
      values.source
    );
  }
  session.registries.spannerValues.length = 0;
}

/** Decode one known property child into `properties`; anything else is reported. */
function readProperty(session: ReaderSession, reader: XmlStreamReader, properties: Record<string, PropertyValue>): void {
  const decode = SPANNER_PROPERTIES[reader.name];
  if (decode) {
    properties[reader.name] = decode(reader);
  } else {
    skipUnknownElement(session.ctx, reader);
  }
}

function readKind(session: ReaderSession, reader: XmlStreamReader): ConnectorKind | undefined {
  const type = reader.stringAttribute('type');
  if (isConnectorKind(type)) {
    return type;
  }

  addDiagnostic(session.ctx, DiagnosticCodes.INVALID_VALUE, 'warning', `Unknown spanner type '${type}'.`, readerAnchor(reader));
  reader.skipCurrentElement();
  return undefined;
}

function submit(session: ReaderSession, fragment: ConnectorFragment, options: SpannerReadOptions): void {
  if (options.deferred) {
    deferConnectorInfo(session, fragment);
  } else {
    addConnectorInfo(session, fragment);
  }
}
