import { readFile } from 'node:fs/promises';

import type { Diagnostic } from '../core/diagnostics.js';
import { readScore } from '../public/api.js';
import type { ConformanceFixtureRecord } from './conformance.js';

/** String-keyed histogram used by conformance summaries. */
export type ConformanceHistogram = Record<string, number>;

/** One fixture execution result. */
export interface ConformanceFixtureExecutionResult {
  fixtureId: string;
  scorePath: string;
  expected: 'pass' | 'fail';
  parseMode: 'strict' | 'lenient';
  diagnostics: Diagnostic[];
  connectorCount: number;
  discardedCount: number;
  observed: 'pass' | 'fail';
  success: boolean;
  failureReasons: string[];
}

export interface ConformanceExecutionReport {
  fixtureCount: number;
  skippedCount: number;
  failCount: number;
  diagnosticCodeHistogram: ConformanceHistogram;
  results: ConformanceFixtureExecutionResult[];
}

/** Run every active fixture through `readScore` and check its declared expectations. */
export async function executeConformanceFixtures(
  fixtures: ConformanceFixtureRecord[]
): Promise<ConformanceExecutionReport> {
  const results: ConformanceFixtureExecutionResult[] = [];
  let skippedCount = 0;

  for (const fixture of fixtures) {
    if (fixture.meta.status === 'skip') {
      skippedCount += 1;
      continue;
    }
    results.push(await executeFixture(fixture));
  }

  const diagnosticCodeHistogram: ConformanceHistogram = {};
  for (const result of results) {
    for (const diagnostic of result.diagnostics) {
      diagnosticCodeHistogram[diagnostic.code] = (diagnosticCodeHistogram[diagnostic.code] ?? 0) + 1;
    }
  }

  return {
    fixtureCount: results.length,
    skippedCount,
    failCount: results.filter((result) => !result.success).length,
    diagnosticCodeHistogram,
    results
  };
}

async function executeFixture(fixture: ConformanceFixtureRecord): Promise<ConformanceFixtureExecutionResult> {
  const { meta } = fixture;
  const parseMode = meta.parse_mode ?? 'lenient';
  const xmlText = await readFile(fixture.scorePath, 'utf8');
  const parsed = readScore(xmlText, { sourceName: fixture.scorePath, mode: parseMode });

  const observed = parsed.score && !parsed.diagnostics.some((d) => d.severity === 'error') ? 'pass' : 'fail';
  const connectorCount = parsed.score?.connectors.length ?? 0;
  const discardedCount = parsed.teardown.discarded;
  const failureReasons: string[] = [];

  if (observed !== meta.expected) {
    failureReasons.push(`expected ${meta.expected} but observed ${observed}`);
  }
  if (meta.expect_connectors !== undefined && meta.expect_connectors !== connectorCount) {
    failureReasons.push(`expected ${meta.expect_connectors} connectors but found ${connectorCount}`);
  }
  if (meta.expect_discarded !== undefined && meta.expect_discarded !== discardedCount) {
    failureReasons.push(`expected ${meta.expect_discarded} discarded fragments but found ${discardedCount}`);
  }
  for (const code of meta.expect_codes ?? []) {
    if (!parsed.diagnostics.some((diagnostic) => diagnostic.code === code)) {
      failureReasons.push(`missing diagnostic ${code}`);
    }
  }

  return {
    fixtureId: meta.id,
    scorePath: fixture.scorePath,
    expected: meta.expected,
    parseMode,
    diagnostics: parsed.diagnostics,
    connectorCount,
    discardedCount,
    observed,
    success: failureReasons.length === 0,
    failureReasons
  };
}

/** Render a report as a Markdown summary table. */
export function formatConformanceReportMarkdown(report: ConformanceExecutionReport): string {
  const lines: string[] = [
    '# Conformance Report',
    '',
    `Fixtures executed: ${report.fixtureCount}`,
    `Skipped: ${report.skippedCount}`,
    `Failed: ${report.failCount}`,
    '',
    '| Fixture | Mode | Expected | Observed | Connectors | Match | Notes |',
    '|---|---|---|---|---|---|---|'
  ];

  for (const result of report.results) {
    const notes = result.failureReasons.length > 0 ? result.failureReasons.join('; ') : 'ok';
    lines.push(
      `| ${result.fixtureId} | ${result.parseMode} | ${result.expected} | ${result.observed} | ${result.connectorCount} | ${
        result.success ? 'yes' : 'no'
      } | ${notes.replaceAll('|', '\\|')} |`
    );
  }

  lines.push('', '## Diagnostic Codes', '');
  const codes = Object.keys(report.diagnosticCodeHistogram).sort();
  if (codes.length === 0) {
    lines.push('- none');
  }
  for (const code of codes) {
    lines.push(`- ${code}: ${report.diagnosticCodeHistogram[code] ?? 0}`);
  }

  return `${lines.join('\n')}\n`;
}
