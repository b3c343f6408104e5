import { describe, expect, it } from 'vitest';

import { fraction, fractionFromTicks } from '../../src/core/fraction.js';
import type { Location } from '../../src/core/location.js';
import type { ConnectorKind } from '../../src/core/score.js';
import {
  chainFragments,
  createConnectorFragment,
  type ConnectorFragment,
  type ConnectorRole
} from '../../src/parser/connector-info.js';
import {
  addConnectorInfo,
  checkConnectors,
  deferConnectorInfo,
  reconnectBrokenConnectors,
  releaseConnectors,
  removeConnector
} from '../../src/parser/connector-resolver.js';
import { createReaderSession, type ReaderSession } from '../../src/parser/reader-session.js';

interface FragmentInit {
  kind?: ConnectorKind;
  id?: number;
  tick: number;
  track?: number;
  role?: ConnectorRole;
  prev?: Location;
  next?: Location;
}

/** Paste-mode sessions keep anchors as absolute ticks in measure 0. */
function pasteSession(): ReaderSession {
  return createReaderSession({ pasteMode: true });
}

function at(tick: number, track = 0): Location {
  return { relative: false, track, frac: fractionFromTicks(tick), measure: 0 };
}

function offset(ticks: number): Location {
  return { relative: true, track: 0, frac: fractionFromTicks(ticks), measure: 0 };
}

function fragment(session: ReaderSession, init: FragmentInit): ConnectorFragment {
  return createConnectorFragment(session.connectors, {
    element: { kind: init.kind ?? 'Slur', id: init.id, properties: {} },
    anchor: at(init.tick, init.track),
    role: init.role,
    prevLocation: init.prev,
    nextLocation: init.next
  });
}

function anchorTicks(session: ReaderSession, index: number): Array<[number, number]> {
  return (session.document.connectors[index]?.anchors ?? []).map((anchor) => [
    anchor.track,
    anchor.tick.numerator * (1920 / anchor.tick.denominator)
  ]);
}

describe('connector resolver', () => {
  it('commits an id-keyed pair when the end arrives', () => {
    const session = pasteSession();

    expect(addConnectorInfo(session, fragment(session, { id: 5, tick: 10, role: 'start' }))).toBeUndefined();
    const committed = addConnectorInfo(session, fragment(session, { id: 5, tick: 40, role: 'end' }));

    expect(committed?.kind).toBe('Slur');
    expect(committed?.id).toBe(5);
    expect(committed?.pasted).toBe(true);
    expect(anchorTicks(session, 0)).toEqual([
      [0, 10],
      [0, 40]
    ]);
    expect(session.connectors.fragments.size).toBe(0);
  });

  it('commits the same pair when the end is seen first', () => {
    const session = pasteSession();

    addConnectorInfo(session, fragment(session, { id: 5, tick: 40, role: 'end' }));
    addConnectorInfo(session, fragment(session, { id: 5, tick: 10, role: 'start' }));

    expect(session.document.connectors).toHaveLength(1);
    expect(anchorTicks(session, 0)).toEqual([
      [0, 10],
      [0, 40]
    ]);
  });

  it('pairs the end with the first matching start only', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { id: 5, tick: 10, role: 'start' }));
    addConnectorInfo(session, fragment(session, { id: 5, tick: 20, role: 'start' }));
    addConnectorInfo(session, fragment(session, { id: 5, tick: 40, role: 'end' }));

    expect(session.document.connectors).toHaveLength(1);
    expect(anchorTicks(session, 0)).toEqual([
      [0, 10],
      [0, 40]
    ]);
    expect([...session.connectors.fragments.values()].map((f) => f.anchor.frac)).toEqual([fractionFromTicks(20)]);
  });

  it('does not link fragments with different ids or kinds', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { id: 5, tick: 10, role: 'start' }));
    addConnectorInfo(session, fragment(session, { id: 6, tick: 40, role: 'end' }));
    addConnectorInfo(session, fragment(session, { kind: 'Tie', id: 5, tick: 40, role: 'end' }));

    expect(session.document.connectors).toHaveLength(0);
    expect(session.connectors.fragments.size).toBe(3);
  });

  it('does not link an end that lies before its start', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { id: 5, tick: 40, role: 'start' }));
    addConnectorInfo(session, fragment(session, { id: 5, tick: 10, role: 'end' }));

    expect(session.document.connectors).toHaveLength(0);
  });

  it('links fragments through explicit relative locations', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { tick: 10, next: offset(30) }));
    addConnectorInfo(session, fragment(session, { tick: 41, prev: offset(-31) }));
    expect(session.document.connectors).toHaveLength(0);

    addConnectorInfo(session, fragment(session, { tick: 40, prev: offset(-30) }));
    expect(anchorTicks(session, 0)).toEqual([
      [0, 10],
      [0, 40]
    ]);
  });

  it('assembles three-part chains', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { tick: 0, next: offset(480) }));
    addConnectorInfo(session, fragment(session, { tick: 480, prev: offset(-480), next: offset(480) }));
    expect(session.document.connectors).toHaveLength(0);
    addConnectorInfo(session, fragment(session, { tick: 960, prev: offset(-480) }));

    expect(anchorTicks(session, 0)).toEqual([
      [0, 0],
      [0, 480],
      [0, 960]
    ]);
    expect(session.connectors.fragments.size).toBe(0);
  });

  it('merges deferred fragments on checkConnectors', () => {
    const session = pasteSession();
    deferConnectorInfo(session, fragment(session, { id: 1, tick: 0, role: 'start' }));
    deferConnectorInfo(session, fragment(session, { id: 1, tick: 480, role: 'end' }));
    expect(session.document.connectors).toHaveLength(0);

    expect(checkConnectors(session)).toBe(1);
    expect(session.connectors.pending).toHaveLength(0);
  });

  it('removes a whole chain', () => {
    const session = pasteSession();
    const start = fragment(session, { tick: 0, next: offset(480) });
    addConnectorInfo(session, start);
    addConnectorInfo(session, fragment(session, { tick: 480, prev: offset(-480), next: offset(480) }));
    expect(chainFragments(session.connectors, start)).toHaveLength(2);

    removeConnector(session, start);
    expect(session.connectors.fragments.size).toBe(0);
  });

  it('discards leftovers at teardown but preserves tuplets', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { id: 1, tick: 0, role: 'start' }));
    addConnectorInfo(session, fragment(session, { kind: 'Tuplet', id: 2, tick: 0, role: 'start' }));
    deferConnectorInfo(session, fragment(session, { id: 3, tick: 0, role: 'end' }));

    expect(releaseConnectors(session)).toEqual({ discarded: 2, preserved: 1 });
    expect(session.document.preservedConnectors.map((element) => element.kind)).toEqual(['Tuplet']);
    expect(session.connectors.fragments.size).toBe(0);
    expect(session.connectors.pending).toHaveLength(0);
    expect(session.ctx.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNPAIRED_CONNECTORS_DISCARDED']);
  });
});

describe('broken connector repair', () => {
  it('joins the closest compatible ends and never reuses one', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { tick: 100, role: 'start' }));
    addConnectorInfo(session, fragment(session, { tick: 102, role: 'end' }));
    addConnectorInfo(session, fragment(session, { tick: 150, role: 'end' }));
    expect(session.document.connectors).toHaveLength(0);

    expect(reconnectBrokenConnectors(session)).toBe(1);
    expect(anchorTicks(session, 0)).toEqual([
      [0, 100],
      [0, 102]
    ]);
    expect([...session.connectors.fragments.values()].map((f) => f.anchor.frac)).toEqual([fractionFromTicks(150)]);
    expect(session.ctx.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['BROKEN_CONNECTORS_RECONNECTED']);
  });

  it('weights track distance by a whole note', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { tick: 100, role: 'start' }));
    addConnectorInfo(session, fragment(session, { tick: 100, track: 1, role: 'end' }));
    addConnectorInfo(session, fragment(session, { tick: 1000, role: 'end' }));

    reconnectBrokenConnectors(session);

    expect(anchorTicks(session, 0)).toEqual([
      [0, 100],
      [0, 1000]
    ]);
  });

  it('measures from an explicit expected location', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { tick: 0, next: offset(480) }));
    addConnectorInfo(session, fragment(session, { tick: 720, prev: offset(-720) }));
    expect(session.document.connectors).toHaveLength(0);

    expect(reconnectBrokenConnectors(session)).toBe(1);
    expect(anchorTicks(session, 0)).toEqual([
      [0, 0],
      [0, 720]
    ]);
  });

  it('never joins a head that lies before the tail', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { tick: 50, role: 'end' }));
    addConnectorInfo(session, fragment(session, { tick: 100, role: 'start' }));

    expect(reconnectBrokenConnectors(session)).toBe(0);
    expect(session.connectors.fragments.size).toBe(2);
    expect(session.ctx.diagnostics).toEqual([]);
  });

  it('never joins fragments of different kinds', () => {
    const session = pasteSession();
    addConnectorInfo(session, fragment(session, { kind: 'Pedal', tick: 0, role: 'start' }));
    addConnectorInfo(session, fragment(session, { kind: 'Trill', tick: 10, role: 'end' }));

    expect(reconnectBrokenConnectors(session)).toBe(0);
  });

  it('resolves anchors against measure starts outside paste mode', () => {
    const session = createReaderSession();
    session.document.measures.push(
      { index: 0, tick: fraction(0), length: fraction(1), elements: [] },
      { index: 1, tick: fraction(1), length: fraction(1), elements: [] }
    );
    const start = createConnectorFragment(session.connectors, {
      element: { kind: 'HairPin', properties: {} },
      anchor: { relative: false, track: 0, frac: fraction(3, 4), measure: 0 },
      role: 'start'
    });
    const end = createConnectorFragment(session.connectors, {
      element: { kind: 'HairPin', properties: {} },
      anchor: { relative: false, track: 0, frac: fraction(1, 4), measure: 1 },
      role: 'end'
    });
    addConnectorInfo(session, start);
    addConnectorInfo(session, end);

    expect(reconnectBrokenConnectors(session)).toBe(1);
    expect(session.document.connectors[0]?.anchors).toEqual([
      { track: 0, tick: fraction(3, 4) },
      { track: 0, tick: fraction(5, 4) }
    ]);
    expect(session.document.connectors[0]?.pasted).toBe(false);
  });
});
