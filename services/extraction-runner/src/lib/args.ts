/**
 * Command-line parsing for the extraction runner
 */

import { parseArgs } from 'node:util';
import { err, ok, parseStrategyMode, type Result, type StrategyDefinition } from '@ledgerlens/shared';

export const USAGE = `Usage:
  extraction-runner run --docs <dir> [--mode baseline|refined|both] [--output <file>] [--evaluate --reference <csv>]
  extraction-runner enqueue --docs <dir> --output-dir <dir> [--mode baseline|refined|both]
  extraction-runner evaluate --results <file|dir> [--results <file|dir> ...] --reference <csv> [--output-dir <dir>]`;

export const DEFAULT_OUTPUT = 'results/extraction_results.json';

export interface RunCommand {
  kind: 'run';
  strategies: StrategyDefinition[];
  docsDir: string;
  output: string;
  /** Reference CSV; set when --evaluate is given */
  reference?: string;
}

export interface EnqueueCommand {
  kind: 'enqueue';
  strategies: StrategyDefinition[];
  docsDir: string;
  outputDir: string;
}

export interface EvaluateCommand {
  kind: 'evaluate';
  /** One or more results files or directories; several are compared side by side */
  results: string[];
  reference: string;
  outputDir?: string;
}

export type Command = RunCommand | EnqueueCommand | EvaluateCommand;

const OPTIONS = {
  mode: { type: 'string', default: 'both' },
  docs: { type: 'string' },
  output: { type: 'string' },
  'output-dir': { type: 'string' },
  evaluate: { type: 'boolean', default: false },
  reference: { type: 'string' },
  results: { type: 'string', multiple: true },
} as const;

function readArgs(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
}

export function parseCommand(argv: readonly string[]): Result<Command, string> {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  const [name] = positionals;

  if (name === 'evaluate') {
    if (!values.results || values.results.length === 0) return err('evaluate requires --results');
    if (!values.reference) return err('evaluate requires --reference');
    return ok({
      kind: 'evaluate',
      results: values.results,
      reference: values.reference,
      outputDir: values['output-dir'],
    });
  }

  if (name !== 'run' && name !== 'enqueue') {
    return err(name ? `Unknown command "${name}"` : 'No command given');
  }

  const strategies = parseStrategyMode(values.mode);
  if (!strategies) return err(`--mode must be baseline, refined or both, got "${values.mode}"`);
  if (!values.docs) return err(`${name} requires --docs`);

  if (name === 'enqueue') {
    if (!values['output-dir']) return err('enqueue requires --output-dir');
    return ok({ kind: 'enqueue', strategies, docsDir: values.docs, outputDir: values['output-dir'] });
  }

  if (values.evaluate && !values.reference) return err('--evaluate requires --reference');

  return ok({
    kind: 'run',
    strategies,
    docsDir: values.docs,
    output: values.output ?? DEFAULT_OUTPUT,
    reference: values.evaluate ? values.reference : undefined,
  });
}
