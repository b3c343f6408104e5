import { SaxesParser, type SaxesAttribute, type SaxesTag } from 'saxes';

/** Line and column origin for diagnostics and traceability. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** One event of the recorded token stream. */
export type XmlToken =
  | {
      type: 'start';
      name: string;
      attributes: Record<string, string>;
      location: XmlLocation;
      path: string;
    }
  | { type: 'end'; name: string; location: XmlLocation }
  | { type: 'text'; text: string; location: XmlLocation }
  | { type: 'comment'; text: string; location: XmlLocation };

type StartToken = Extract<XmlToken, { type: 'start' }>;

/** Parse failure wrapper that keeps source coordinates when available. */
export class XmlParseError extends Error {
  readonly source?: XmlLocation;

  constructor(message: string, source?: XmlLocation) {
    super(message);
    this.name = 'XmlParseError';
    this.source = source;
  }
}

/** A required attribute was read without a default and is absent. */
export class MissingAttributeError extends Error {
  readonly attribute: string;
  readonly element: string;
  readonly source?: XmlLocation;

  constructor(attribute: string, element: string, source?: XmlLocation) {
    super(`<${element}> is missing required attribute '${attribute}'.`);
    this.name = 'MissingAttributeError';
    this.attribute = attribute;
    this.element = element;
    this.source = source;
  }
}

/**
 * Tokenize XML into start/end/text/comment events with positions and stable
 * XPath-like element paths.
 */
export function tokenizeXml(xmlText: string, sourceName?: string): XmlToken[] {
  const parser = new SaxesParser({
    xmlns: true,
    position: true,
    fileName: sourceName
  });

  const tokens: XmlToken[] = [];
  const pathStack: Array<{ path: string; childNameCount: Map<string, number> }> = [];
  const openTagLocations: XmlLocation[] = [];
  let parseError: XmlParseError | undefined;

  const here = (): XmlLocation => ({ line: parser.line, column: parser.column + 1 });

  parser.on('error', (error) => {
    if (!parseError) {
      parseError = new XmlParseError(error.message, here());
    }
  });

  parser.on('opentagstart', () => {
    openTagLocations.push(here());
  });

  parser.on('opentag', (tag) => {
    const location = openTagLocations.pop() ?? here();
    const name = getNodeName(tag);
    const parent = pathStack.at(-1);
    const path = buildPath(parent, name);

    pathStack.push({ path, childNameCount: new Map<string, number>() });
    tokens.push({ type: 'start', name, attributes: toAttributeMap(tag), location, path });
  });

  parser.on('text', (text) => {
    if (pathStack.length > 0) {
      tokens.push({ type: 'text', text, location: here() });
    }
  });

  parser.on('cdata', (text) => {
    tokens.push({ type: 'text', text, location: here() });
  });

  parser.on('comment', (text) => {
    tokens.push({ type: 'comment', text, location: here() });
  });

  parser.on('closetag', (tag) => {
    pathStack.pop();
    tokens.push({ type: 'end', name: getNodeName(tag), location: here() });
  });

  parser.write(xmlText).close();

  if (parseError) {
    throw parseError;
  }

  if (!tokens.some((token) => token.type === 'start')) {
    throw new XmlParseError('No XML root element found');
  }

  return tokens;
}

/**
 * Forward-only pull reader over a recorded token stream.
 * Element handlers receive the reader positioned on their start token and
 * must consume through the matching end token.
 */
export class XmlStreamReader {
  private readonly tokens: XmlToken[];
  private index = -1;
  private readonly open: StartToken[] = [];

  constructor(tokens: XmlToken[]) {
    this.tokens = tokens;
  }

  static fromText(xmlText: string, sourceName?: string): XmlStreamReader {
    return new XmlStreamReader(tokenizeXml(xmlText, sourceName));
  }

  /** Innermost open element, or `undefined` outside the root. */
  private get element(): StartToken | undefined {
    return this.open.at(-1);
  }

  get name(): string {
    return this.element?.name ?? '';
  }

  get path(): string | undefined {
    return this.element?.path;
  }

  get location(): XmlLocation | undefined {
    return this.element?.location;
  }

  get attributes(): Record<string, string> {
    return this.element?.attributes ?? {};
  }

  get depth(): number {
    return this.open.length;
  }

  get atEnd(): boolean {
    return this.index >= this.tokens.length - 1;
  }

  /** Advance one token, keeping the open-element stack in sync. */
  readNext(): XmlToken | undefined {
    if (this.atEnd) {
      return undefined;
    }

    this.index += 1;
    const token = this.tokens[this.index];
    if (token?.type === 'start') {
      this.open.push(token);
    } else if (token?.type === 'end') {
      this.open.pop();
    }
    return token;
  }

  /**
   * Read to the next child start element of the current element.
   * Returns false once the current element's end token was consumed.
   */
  readNextStartElement(): boolean {
    for (let token = this.readNext(); token; token = this.readNext()) {
      if (token.type === 'start') {
        return true;
      }
      if (token.type === 'end') {
        return false;
      }
    }
    return false;
  }

  /** Consume the rest of the current element, including its end token. */
  skipCurrentElement(): void {
    this.skipTo(this.open.length);
  }

  /** Consume tokens until the element opened at `depth` has been closed. */
  skipTo(depth: number): void {
    while (this.open.length >= depth) {
      if (!this.readNext()) {
        break;
      }
    }
  }

  /** Concatenated text content of the current element (children included). */
  readElementText(): string {
    const depth = this.open.length;
    let text = '';
    while (this.open.length >= depth) {
      const token = this.readNext();
      if (!token) {
        break;
      }
      if (token.type === 'text') {
        text += token.text;
      }
    }
    return text;
  }

  /** Inner markup of the current element, verbatim with text escaped. */
  readXml(): string {
    const depth = this.open.length;
    let markup = '';
    for (let token = this.readNext(); token; token = this.readNext()) {
      if (token.type === 'end' && this.open.length < depth) {
        break;
      }
      markup += serializeToken(token);
    }
    return markup;
  }

  hasAttribute(key: string): boolean {
    return this.attributes[key] !== undefined;
  }

  stringAttribute(key: string, fallback?: string): string {
    const raw = this.attributes[key];
    if (raw !== undefined) {
      return raw;
    }
    return this.requireFallback(key, fallback);
  }

  intAttribute(key: string, fallback?: number): number {
    const raw = this.attributes[key];
    if (raw === undefined) {
      return this.requireFallback(key, fallback);
    }
    const parsed = Number.parseInt(raw, 10);
    return Number.isSafeInteger(parsed) ? parsed : 0;
  }

  doubleAttribute(key: string, fallback?: number): number {
    const raw = this.attributes[key];
    if (raw === undefined) {
      return this.requireFallback(key, fallback);
    }
    const parsed = Number.parseFloat(raw);
    return Number.isNaN(parsed) ? 0 : parsed;
  }

  private requireFallback<T>(key: string, fallback: T | undefined): T {
    if (fallback === undefined) {
      throw new MissingAttributeError(key, this.name, this.location);
    }
    return fallback;
  }
}

/** Serialize one token back to markup for `readXml`. */
function serializeToken(token: XmlToken): string {
  switch (token.type) {
    case 'start': {
      const attributes = Object.entries(token.attributes)
        .map(([key, value]) => ` ${key}="${escapeText(value)}"`)
        .join('');
      return `<${token.name}${attributes}>`;
    }
    case 'end':
      return `</${token.name}>`;
    case 'text':
      return escapeText(token.text);
    case 'comment':
      return '';
  }
}

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/** Prefer namespace-local names so handlers can stay prefix-agnostic. */
function getNodeName(tag: SaxesTag): string {
  if (tag.local && tag.local.length > 0) {
    return tag.local;
  }

  const name = tag.name;
  const index = name.indexOf(':');
  return index === -1 ? name : name.slice(index + 1);
}

/** Normalize SAX attribute payload into local-name string values. */
function toAttributeMap(tag: SaxesTag): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [key, value] of Object.entries(tag.attributes)) {
    if (typeof value === 'string') {
      out[key] = value;
      continue;
    }

    setAttributeAlias(out, value, key);
  }

  return out;
}

function setAttributeAlias(out: Record<string, string>, attribute: SaxesAttribute, key: string): void {
  if ('local' in attribute && attribute.local.length > 0) {
    out[attribute.local] = attribute.value;
    return;
  }
  out[key] = attribute.value;
}

/** Build deterministic element paths with sibling indexes. */
function buildPath(
  parent: { path: string; childNameCount: Map<string, number> } | undefined,
  name: string
): string {
  if (!parent) {
    return `/${name}[1]`;
  }

  const next = (parent.childNameCount.get(name) ?? 0) + 1;
  parent.childNameCount.set(name, next);
  return `${parent.path}/${name}[${next}]`;
}
