/**
 * Replay loop
 *
 * Applies an operation stream line by line. A failing line stops the run
 * unless keepGoing is set; either way any failure makes the exit code 1.
 */

import type { BillingEngine } from '../services/index.js';
import { parsePeriod } from '../services/index.js';
import type { BillingSummary } from '../types/index.js';

import {
  formatError,
  formatRecord,
  formatResult,
  formatSummary,
} from './formatter.js';
import { parseLine } from './parser.js';

export interface ReplayOutput {
  write: (line: string) => void;
  error: (line: string) => void;
}

export interface ReplayOptions {
  keepGoing?: boolean;
  verbose?: boolean;
  summary?: boolean;
}

export interface ReplayReport {
  applied: number;
  failed: number;
  exitCode: 0 | 1;
}

/**
 * Settle every touched month and summarise each, oldest first
 */
export function summarizeRun(engine: BillingEngine): BillingSummary[] {
  const periods = [
    ...new Set(engine.finalize().map((report) => report.period)),
  ].sort();

  const summaries: BillingSummary[] = [];
  for (const period of periods) {
    const key = parsePeriod(period);
    if (key.success) {
      summaries.push(engine.summarize(key.data.year, key.data.month));
    }
  }
  return summaries;
}

export async function replay(
  engine: BillingEngine,
  lines: AsyncIterable<string> | Iterable<string>,
  output: ReplayOutput,
  options: ReplayOptions = {}
): Promise<ReplayReport> {
  let lineNumber = 0;
  let applied = 0;
  let failed = 0;

  for await (const line of lines) {
    lineNumber += 1;

    const parsed = parseLine(line, lineNumber);
    if (!parsed.success) {
      failed += 1;
      output.error(formatError(lineNumber, parsed.error));
      if (options.keepGoing !== true) {
        break;
      }
      continue;
    }
    if (parsed.data === null) {
      continue;
    }

    if (options.verbose === true) {
      output.error(`line ${lineNumber}: ${formatRecord(parsed.data)}`);
    }

    const result = engine.apply(parsed.data);
    if (!result.success) {
      failed += 1;
      output.error(formatError(lineNumber, result.error));
      if (options.keepGoing !== true) {
        break;
      }
      continue;
    }

    applied += 1;
    output.write(formatResult(result.data));
  }

  if (options.summary === true) {
    for (const summary of summarizeRun(engine)) {
      formatSummary(summary).forEach((line) => output.write(line));
    }
  }

  return { applied, failed, exitCode: failed > 0 ? 1 : 0 };
}
