import { access, readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import { DiagnosticCodes, type DiagnosticCode } from '../core/diagnostics.js';

/** Expected fixture outcome. */
export type FixtureExpectation = 'pass' | 'fail';
/** Fixture activation status in the conformance suite. */
export type FixtureStatus = 'active' | 'skip';
/** Reader strictness applied when running a fixture. */
export type FixtureParseMode = 'strict' | 'lenient';

/** Metadata contract for one conformance fixture sidecar file. */
export interface ConformanceFixtureMeta {
  id: string;
  source: string;
  category: string;
  expected: FixtureExpectation;
  status: FixtureStatus;
  parse_mode?: FixtureParseMode;
  notes?: string;
  /** Number of connectors the document must commit. */
  expect_connectors?: number;
  /** Number of unpaired fragments discarded at teardown. */
  expect_discarded?: number;
  /** Diagnostic codes that must be reported. */
  expect_codes?: DiagnosticCode[];
}

/** Resolved fixture record including metadata and score file paths. */
export interface ConformanceFixtureRecord {
  metaPath: string;
  scorePath: string;
  meta: ConformanceFixtureMeta;
}

/** Validation error for malformed conformance metadata. */
export class ConformanceMetadataError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Metadata error in ${filePath}: ${message}`);
    this.name = 'ConformanceMetadataError';
    this.filePath = filePath;
  }
}

const META_SUFFIXES = ['.meta.yaml', '.meta.yml'];
const SCORE_EXTENSIONS = ['.mscx', '.xml'];
const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(DiagnosticCodes));

type MetaObject = Record<string, unknown>;

/** Load and validate all conformance fixture records under `rootDir`. */
export async function loadConformanceFixtures(rootDir: string): Promise<ConformanceFixtureRecord[]> {
  const metaFiles = await findMetadataFiles(rootDir);
  const records: ConformanceFixtureRecord[] = [];

  for (const metaPath of metaFiles) {
    const raw = await readFile(metaPath, 'utf8');
    const meta = parseAndValidateMeta(metaPath, parseYaml(raw));
    const scorePath = await resolveScorePath(metaPath);
    records.push({ metaPath, scorePath, meta });
  }

  records.sort((left, right) => left.meta.id.localeCompare(right.meta.id));
  return records;
}

async function findMetadataFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (META_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

function isMetaObject(input: unknown): input is MetaObject {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/** Parse YAML metadata into a validated `ConformanceFixtureMeta` object. */
function parseAndValidateMeta(filePath: string, input: unknown): ConformanceFixtureMeta {
  if (!isMetaObject(input)) {
    throw new ConformanceMetadataError(filePath, 'metadata must be a YAML object');
  }

  const expected = readRequiredString(filePath, input, 'expected');
  if (expected !== 'pass' && expected !== 'fail') {
    throw new ConformanceMetadataError(filePath, "'expected' must be 'pass' or 'fail'");
  }

  const status = readRequiredString(filePath, input, 'status');
  if (status !== 'active' && status !== 'skip') {
    throw new ConformanceMetadataError(filePath, "'status' must be 'active' or 'skip'");
  }

  const meta: ConformanceFixtureMeta = {
    id: readRequiredString(filePath, input, 'id'),
    source: readRequiredString(filePath, input, 'source'),
    category: readRequiredString(filePath, input, 'category'),
    expected,
    status
  };

  const parseMode = input.parse_mode;
  if (parseMode !== undefined && parseMode !== null) {
    if (parseMode !== 'strict' && parseMode !== 'lenient') {
      throw new ConformanceMetadataError(filePath, "'parse_mode' must be 'strict' or 'lenient'");
    }
    meta.parse_mode = parseMode;
  }

  const notes = input.notes;
  if (typeof notes === 'string') {
    meta.notes = notes;
  }

  const connectors = readOptionalCount(filePath, input, 'expect_connectors');
  if (connectors !== undefined) {
    meta.expect_connectors = connectors;
  }
  const discarded = readOptionalCount(filePath, input, 'expect_discarded');
  if (discarded !== undefined) {
    meta.expect_discarded = discarded;
  }
  const codes = readOptionalCodes(filePath, input, 'expect_codes');
  if (codes !== undefined) {
    meta.expect_codes = codes;
  }

  return meta;
}

function readRequiredString(filePath: string, obj: MetaObject, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConformanceMetadataError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

function readOptionalCount(filePath: string, obj: MetaObject, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConformanceMetadataError(filePath, `'${key}' must be a non-negative integer`);
  }
  return value;
}

function readOptionalCodes(filePath: string, obj: MetaObject, key: string): DiagnosticCode[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConformanceMetadataError(filePath, `'${key}' must be an array of diagnostic codes`);
  }

  const codes: DiagnosticCode[] = [];
  for (const item of value) {
    if (!isDiagnosticCode(item)) {
      throw new ConformanceMetadataError(filePath, `'${String(item)}' is not a known diagnostic code`);
    }
    codes.push(item);
  }
  return codes;
}

function isDiagnosticCode(value: unknown): value is DiagnosticCode {
  return typeof value === 'string' && KNOWN_CODES.has(value);
}

/** Resolve the score file that belongs to one metadata file. */
async function resolveScorePath(metaPath: string): Promise<string> {
  const base = stripMetaSuffix(metaPath);

  for (const extension of SCORE_EXTENSIONS) {
    const candidate = `${base}${extension}`;
    if (await exists(candidate)) {
      return candidate;
    }
  }

  throw new ConformanceMetadataError(metaPath, 'no matching score file found for metadata');
}

function stripMetaSuffix(filePath: string): string {
  const suffix = META_SUFFIXES.find((candidate) => filePath.endsWith(candidate));
  return suffix ? filePath.slice(0, -suffix.length) : filePath;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
