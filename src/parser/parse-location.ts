import { relativeLocation, type Location } from '../core/location.js';
import { VOICES_PER_STAFF } from '../core/score.js';
import { skipUnknownElement, type ParseContext } from './parse-context.js';
import { readFraction, readInt } from './xml-utils.js';
import type { XmlStreamReader } from './xml-stream.js';

/**
 * Read a `<location>` body as a relative location:
 * `measures`, `fractions`, `staves` and `voices` offsets, each defaulting to 0.
 */
export function readLocation(ctx: ParseContext, reader: XmlStreamReader): Location {
  const loc = relativeLocation();
  let track = 0;

  while (reader.readNextStartElement()) {
    switch (reader.name) {
      case 'measures':
        loc.measure = readInt(reader);
        break;
      case 'fractions':
        loc.frac = readFraction(reader);
        break;
      case 'staves':
        track += readInt(reader) * VOICES_PER_STAFF;
        break;
      case 'voices':
        track += readInt(reader);
        break;
      default:
        skipUnknownElement(ctx, reader);
    }
  }

  loc.track = track;
  return loc;
}

/** Read a wrapper such as `<next>`/`<prev>` holding one `<location>`. */
export function readLocationWrapper(ctx: ParseContext, reader: XmlStreamReader): Location | undefined {
  let loc: Location | undefined;
  while (reader.readNextStartElement()) {
    if (reader.name === 'location') {
      loc = readLocation(ctx, reader);
    } else {
      skipUnknownElement(ctx, reader);
    }
  }
  return loc;
}
