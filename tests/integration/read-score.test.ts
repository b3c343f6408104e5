import { describe, expect, it } from 'vitest';

import { fraction, readScore } from '../../src/public/api.js';

const TWO_MEASURES = `<?xml version="1.0" encoding="UTF-8"?>
<museScore version="3.02">
  <programVersion>3.6.2</programVersion>
  <Score>
    <TextStyle name="Rehearsal" />
    <Staff id="1">
      <Measure>
        <voice>
          <Chord>
            <durationType>quarter</durationType>
            <Note>
              <Spanner type="Tie" id="1" />
              <pitch>60</pitch>
            </Note>
          </Chord>
          <Chord>
            <durationType>quarter</durationType>
            <Note>
              <endSpanner id="1" />
              <pitch>60</pitch>
            </Note>
          </Chord>
          <Rest>
            <durationType>half</durationType>
          </Rest>
        </voice>
      </Measure>
      <Measure>
        <voice>
          <Chord>
            <durationType>quarter</durationType>
            <Spanner type="Slur">
              <Slur><direction>up</direction></Slur>
              <next><location><fractions>1/4</fractions></location></next>
            </Spanner>
            <Note><pitch>62</pitch></Note>
          </Chord>
          <StaffText style="Rehearsal">hello <b>world</b></StaffText>
          <Chord>
            <durationType>quarter</durationType>
            <Spanner type="Slur">
              <prev><location><fractions>-1/4</fractions></location></prev>
            </Spanner>
            <Note><pitch>64</pitch></Note>
          </Chord>
          <Rest>
            <durationType>half</durationType>
          </Rest>
        </voice>
      </Measure>
    </Staff>
  </Score>
</museScore>`;

/** Wrap voice content in a one-staff, one-measure document. */
function singleMeasure(voice: string): string {
  return `<museScore><Score><Staff id="1"><Measure><voice>${voice}</voice></Measure></Staff></Score></museScore>`;
}

const TRIPLET_VOICE = `
  <Tuplet id="1">
    <normalNotes>2</normalNotes>
    <actualNotes>3</actualNotes>
    <baseNote>eighth</baseNote>
  </Tuplet>
  <Chord><durationType>eighth</durationType><Tuplet>1</Tuplet><Note><pitch>60</pitch></Note></Chord>
  <Chord><durationType>eighth</durationType><Tuplet>1</Tuplet><Note><pitch>62</pitch></Note></Chord>
  <Chord><durationType>eighth</durationType><Tuplet>1</Tuplet><Note><pitch>64</pitch></Note></Chord>
  <endTuplet />
  <Rest><durationType>quarter</durationType></Rest>
  <Rest><durationType>half</durationType></Rest>`;

const NESTED_TUPLET_VOICE = `
  <Tuplet id="1">
    <normalNotes>2</normalNotes>
    <actualNotes>3</actualNotes>
    <baseNote>quarter</baseNote>
  </Tuplet>
  <location><fractions>1/6</fractions></location>
  <Chord><durationType>quarter</durationType><Tuplet>1</Tuplet><Note><pitch>67</pitch></Note></Chord>
  <Chord><durationType>quarter</durationType><Tuplet>1</Tuplet><Note><pitch>69</pitch></Note></Chord>
  <location><fractions>-1/2</fractions></location>
  <Tuplet id="2">
    <Tuplet>1</Tuplet>
    <normalNotes>2</normalNotes>
    <actualNotes>3</actualNotes>
    <baseNote>eighth</baseNote>
  </Tuplet>
  <Chord><durationType>eighth</durationType><Tuplet>2</Tuplet><Note><pitch>60</pitch></Note></Chord>
  <Chord><durationType>eighth</durationType><Tuplet>2</Tuplet><Note><pitch>62</pitch></Note></Chord>
  <Chord><durationType>eighth</durationType><Tuplet>2</Tuplet><Note><pitch>64</pitch></Note></Chord>
  <location><fractions>1/3</fractions></location>
  <Rest><durationType>half</durationType></Rest>`;

describe('readScore', () => {
  it('resolves id-keyed ties and location-linked slurs', () => {
    const result = readScore(TWO_MEASURES);

    expect(result.diagnostics).toEqual([]);
    expect(result.teardown).toEqual({ discarded: 0, preserved: 0 });
    expect(result.score?.connectors).toEqual([
      {
        kind: 'Tie',
        id: 1,
        properties: {},
        anchors: [
          { track: 0, tick: fraction(0) },
          { track: 0, tick: fraction(1, 4) }
        ],
        pasted: false
      },
      {
        kind: 'Slur',
        id: undefined,
        properties: { direction: 'up' },
        anchors: [
          { track: 0, tick: fraction(1) },
          { track: 0, tick: fraction(5, 4) }
        ],
        pasted: false
      }
    ]);
  });

  it('places rhythmic elements into their measures', () => {
    const score = readScore(TWO_MEASURES).score;

    expect(score?.measures.map((measure) => measure.tick)).toEqual([fraction(0), fraction(1)]);
    expect(score?.measures[0]?.elements.map((element) => element.tick)).toEqual([
      fraction(0),
      fraction(1, 4),
      fraction(1, 2)
    ]);
    expect(score?.measures[1]?.elements.map((element) => element.kind)).toEqual(['chord', 'chord', 'rest']);
  });

  it('applies registered user text styles to staff text', () => {
    const score = readScore(TWO_MEASURES).score;

    expect(score?.texts).toEqual([{ tick: fraction(5, 4), track: 0, style: 'user1', text: 'hello <b>world</b>' }]);
  });

  it('falls back to the default style for unknown text styles', () => {
    const result = readScore(singleMeasure('<StaffText style="Nope">x</StaffText>'));

    expect(result.score?.texts[0]?.style).toBe('default');
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNKNOWN_TEXT_STYLE']);
  });

  it('scales tuplet members to real time and finalizes the tuplet', () => {
    const result = readScore(singleMeasure(TRIPLET_VOICE));
    const elements = result.score?.measures[0]?.elements ?? [];

    expect(result.diagnostics).toEqual([]);
    expect(elements.map((element) => element.tick)).toEqual([
      fraction(0),
      fraction(1, 12),
      fraction(1, 6),
      fraction(1, 4),
      fraction(1, 2)
    ]);
    expect(elements.map((element) => element.actualDuration)).toEqual([
      fraction(1, 12),
      fraction(1, 12),
      fraction(1, 12),
      fraction(1, 4),
      fraction(1, 2)
    ]);
    expect(elements[0]?.tupletId).toBe(1);
    expect(result.score?.tuplets).toHaveLength(1);
    expect(result.score?.tuplets[0]?.elements).toHaveLength(3);
  });

  it('scales nested tuplet members through both ratios', () => {
    const result = readScore(singleMeasure(NESTED_TUPLET_VOICE));
    const elements = result.score?.measures[0]?.elements ?? [];
    const [outer, inner] = result.score?.tuplets ?? [];

    expect(result.diagnostics).toEqual([]);
    expect(elements.map((element) => element.tick)).toEqual([
      fraction(1, 6),
      fraction(1, 3),
      fraction(0),
      fraction(1, 18),
      fraction(1, 9),
      fraction(1, 2)
    ]);
    expect(elements[0]?.actualDuration).toEqual(fraction(1, 6));
    expect(elements[2]?.actualDuration).toEqual(fraction(1, 18));
    expect(outer?.elements.map((element) => element.kind)).toEqual(['tuplet', 'chord', 'chord']);
    expect(inner?.parent?.id).toBe(1);
    expect(inner?.elements).toHaveLength(3);
  });

  it('drops an empty tuplet with a warning', () => {
    const result = readScore(singleMeasure('<Tuplet id="2" /><Rest><durationType>measure</durationType></Rest>'));

    expect(result.score?.tuplets).toEqual([]);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['EMPTY_TUPLET']);
  });

  it('reports unresolved tuplet and beam references', () => {
    const result = readScore(
      singleMeasure('<Chord><durationType>quarter</durationType><Beam>9</Beam><Tuplet>4</Tuplet></Chord>')
    );
    const chord = result.score?.measures[0]?.elements[0];

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNRESOLVED_TUPLET', 'UNRESOLVED_BEAM']);
    expect(chord?.actualDuration).toEqual(fraction(1, 4));
    expect(chord?.beamId).toBeUndefined();
  });

  it('resolves beams defined before their members', () => {
    const result = readScore(
      singleMeasure('<Beam id="2" /><Chord><durationType>eighth</durationType><Beam>2</Beam></Chord>')
    );

    expect(result.score?.measures[0]?.elements[0]?.beamId).toBe(2);
    expect(result.score?.beams).toEqual([{ id: 2, track: 0, tick: fraction(0) }]);
  });

  it('carries measure lengths forward', () => {
    const xml = `<museScore><Score><Staff id="1">
      <Measure len="3/4"><voice><Rest><durationType>measure</durationType></Rest></voice></Measure>
      <Measure><voice><Rest><durationType>measure</durationType></Rest></voice></Measure>
    </Staff></Score></museScore>`;
    const score = readScore(xml).score;

    expect(score?.measures.map((measure) => measure.length)).toEqual([fraction(3, 4), fraction(3, 4)]);
    expect(score?.measures[1]?.tick).toEqual(fraction(3, 4));
    expect(score?.measures[1]?.elements[0]?.duration).toEqual(fraction(3, 4));
  });

  it('reuses measures for later staves on their own tracks', () => {
    const rest = '<Measure><voice><Rest><durationType>measure</durationType></Rest></voice></Measure>';
    const xml = `<museScore><Score><Staff id="1">${rest}</Staff><Staff id="2">${rest}</Staff></Score></museScore>`;
    const score = readScore(xml).score;

    expect(score?.measures).toHaveLength(1);
    expect(score?.measures[0]?.elements.map((element) => element.track)).toEqual([0, 4]);
  });

  it('discards spanners that never close', () => {
    const result = readScore(
      singleMeasure('<Spanner type="HairPin" id="3" /><Rest><durationType>measure</durationType></Rest>')
    );

    expect(result.score?.connectors).toEqual([]);
    expect(result.teardown).toEqual({ discarded: 1, preserved: 0 });
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNPAIRED_CONNECTORS_DISCARDED']);
  });

  it('drops an end spanner with no registered start', () => {
    const result = readScore(singleMeasure('<endSpanner id="7" />'));

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNRESOLVED_SPANNER_END']);
    expect(result.teardown).toEqual({ discarded: 0, preserved: 0 });
  });

  it('clamps the dot count to the supported range', () => {
    const result = readScore(
      singleMeasure(
        '<Rest><durationType>quarter</durationType><dots>1100</dots></Rest>' +
          '<Rest><durationType>quarter</durationType><dots>-2</dots></Rest>'
      )
    );

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['INVALID_VALUE', 'INVALID_VALUE']);
    expect(result.score?.measures[0]?.elements.map((element) => element.duration)).toEqual([
      fraction(31, 64),
      fraction(1, 4)
    ]);
  });

  it('skips an element whose time arithmetic leaves the integer range', () => {
    const result = readScore(
      singleMeasure(
        '<Tuplet id="1"><normalNotes>2</normalNotes><actualNotes>9007199254740991</actualNotes></Tuplet>' +
          '<Chord><durationType>eighth</durationType><Tuplet>1</Tuplet></Chord>' +
          '<Rest><durationType>quarter</durationType></Rest>'
      )
    );

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['INVALID_VALUE', 'EMPTY_TUPLET']);
    expect(result.diagnostics[0]?.xmlPath).toBe('/museScore[1]/Score[1]/Staff[1]/Measure[1]/voice[1]/Chord[1]');
    expect(result.score?.measures[0]?.elements.map((element) => element.kind)).toEqual(['rest']);
  });

  it('closes a spanner whose end was read in an earlier voice', () => {
    const xml = `<museScore><Score><Staff id="1"><Measure>
      <voice>
        <Chord><durationType>quarter</durationType><Note><pitch>60</pitch></Note></Chord>
        <Chord><durationType>quarter</durationType><endSpanner id="4" /><Note><pitch>62</pitch></Note></Chord>
        <Rest><durationType>half</durationType></Rest>
      </voice>
      <voice>
        <Chord><durationType>quarter</durationType><Spanner type="Slur" id="4" /><Note><pitch>55</pitch></Note></Chord>
        <Rest><durationType>quarter</durationType></Rest>
        <Rest><durationType>half</durationType></Rest>
      </voice>
    </Measure></Staff></Score></museScore>`;

    const result = readScore(xml);

    expect(result.diagnostics).toEqual([]);
    expect(result.teardown).toEqual({ discarded: 0, preserved: 0 });
    expect(result.score?.connectors).toEqual([
      {
        kind: 'Slur',
        id: 4,
        properties: {},
        anchors: [
          { track: 1, tick: fraction(0) },
          { track: 0, tick: fraction(1, 4) }
        ],
        pasted: false
      }
    ]);
  });

  it('skips an element with a missing required attribute and keeps reading', () => {
    const result = readScore(
      singleMeasure('<Tuplet><normalNotes>2</normalNotes></Tuplet><Chord><durationType>quarter</durationType></Chord>')
    );

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['MISSING_ATTRIBUTE']);
    expect(result.diagnostics[0]?.xmlPath).toBe('/museScore[1]/Score[1]/Staff[1]/Measure[1]/voice[1]/Tuplet[1]');
    expect(result.score?.measures[0]?.elements.map((element) => element.tick)).toEqual([fraction(0)]);
  });
});

describe('readScore diagnostics', () => {
  const WITH_UNKNOWN = ['<museScore>', '  <Score>', '    <Bogus />', '  </Score>', '</museScore>'].join('\n');

  it('reports unknown elements as warnings in lenient mode', () => {
    const result = readScore(WITH_UNKNOWN);

    expect(result.score).toBeDefined();
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['UNKNOWN_ELEMENT', 'warning']
    ]);
    expect(result.diagnostics[0]?.xmlPath).toBe('/museScore[1]/Score[1]/Bogus[1]');
  });

  it('fails validation in strict mode', () => {
    const result = readScore(WITH_UNKNOWN, { mode: 'strict' });

    expect(result.score).toBeUndefined();
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['UNKNOWN_ELEMENT', 'error']
    ]);
  });

  it('shifts reported lines by the line offset', () => {
    const result = readScore(WITH_UNKNOWN, { sourceName: 'embedded.mscx', lineOffset: 10 });

    expect(result.diagnostics[0]?.source?.name).toBe('embedded.mscx');
    expect(result.diagnostics[0]?.source?.line).toBe(13);
  });

  it('rejects malformed XML', () => {
    const result = readScore('<museScore><Score></museScore>');

    expect(result.score).toBeUndefined();
    expect(result.diagnostics[0]?.code).toBe('XML_NOT_WELL_FORMED');
    expect(result.diagnostics[0]?.severity).toBe('error');
  });

  it('rejects other root elements', () => {
    const result = readScore('<score-partwise />');

    expect(result.score).toBeUndefined();
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNSUPPORTED_ROOT']);
  });
});
