/**
 * Extraction Runner
 *
 * run:      extract locally on a bounded pool and write extraction_results.json
 * enqueue:  queue one extract_document job per document x strategy
 * evaluate: score saved results against a reference CSV
 */

import path from 'path';
import { ulid } from 'ulid';
import {
  logger,
  loadConfig,
  loadDocuments,
  loadExtractionResults,
  loadReferenceStore,
  runExtraction,
  writeExtractionResults,
  compareStrategies,
  createQueue,
  QUEUE_NAMES,
  OpenAiEmbeddingService,
  OpenAiGenerationBackend,
  RunError,
  type Config,
  type ExtractDocumentJob,
  type LoadedResults,
} from '@ledgerlens/shared';
import { USAGE, parseCommand, type EnqueueCommand, type EvaluateCommand, type RunCommand } from './lib/args';
import { evaluateRuns } from './lib/evaluate';
import { formatComparison, formatEvaluationSummary } from './lib/report';

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

function evaluateAndReport(
  runs: readonly LoadedResults[],
  referencePath: string,
  outputDir: string,
  config: Readonly<Config>
): void {
  const references = loadReferenceStore(referencePath);
  const reports = evaluateRuns(runs, references, {
    tolerance: config.evaluationTolerance,
    absoluteTolerance: config.absoluteTolerance,
    outputDir,
  });

  for (const report of reports) print(formatEvaluationSummary(report));
  if (reports.length > 1) print(formatComparison(compareStrategies(reports)));
}

function defaultOutputDir(resultsPath: string): string {
  return path.extname(resultsPath) === '.json' ? path.dirname(resultsPath) : resultsPath;
}

async function runCommand(command: RunCommand, config: Readonly<Config>): Promise<number> {
  const documents = loadDocuments(command.docsDir);

  const result = await runExtraction(
    documents,
    command.strategies,
    {
      embeddings: new OpenAiEmbeddingService(config),
      backend: new OpenAiGenerationBackend(config),
    },
    {
      concurrency: config.workerConcurrency,
      taskTimeoutMs: config.taskTimeoutMs,
    }
  );

  const file = writeExtractionResults(
    command.output,
    {
      runId: result.runId,
      startedAt: result.startedAt,
      finishedAt: result.finishedAt,
      backend: config.generationBackend,
      generationModel: config.generationModel,
      embeddingModel: config.embeddingModel,
      strategies: command.strategies.map((s) => s.kind),
      documentCount: documents.length,
    },
    result.outcomes
  );
  print(`Wrote ${result.outcomes.length} outcomes to ${command.output}`);

  if (result.fatal) {
    logger.error('Run finished with a fatal error', result.fatal);
    return 1;
  }

  if (command.reference) {
    const run = { source: command.output, run: file.run, outcomes: result.outcomes };
    evaluateAndReport([run], command.reference, path.dirname(command.output), config);
  }
  return 0;
}

async function enqueueCommand(command: EnqueueCommand, config: Readonly<Config>): Promise<number> {
  const documents = loadDocuments(command.docsDir);
  if (documents.length === 0) {
    throw new RunError('No input documents', 'no_documents');
  }

  const queue = createQueue<ExtractDocumentJob, void>(QUEUE_NAMES.EXTRACT_DOCUMENT, config);
  const runId = ulid();
  const outputDir = path.resolve(command.outputDir);

  try {
    for (const document of documents) {
      for (const strategy of command.strategies) {
        const job: ExtractDocumentJob = {
          event_type: 'document.extract',
          correlation_id: ulid(),
          document_id: document.id,
          source_path: path.resolve(document.sourcePath),
          file_type: document.fileType,
          fiscal_year: document.fiscalYear,
          strategy: strategy.kind,
          output_dir: outputDir,
          enqueued_at: new Date().toISOString(),
        };
        await queue.add('extract_document', job, {
          jobId: `extract_${runId}_${document.id}_${strategy.kind}`,
        });
      }
    }
  } finally {
    await queue.close();
  }

  const jobs = documents.length * command.strategies.length;
  logger.info('Enqueued extract_document jobs', { run_id: runId, jobs, output_dir: outputDir });
  print(`Enqueued ${jobs} jobs; outcomes will be written to ${outputDir}`);
  return 0;
}

function evaluateCommand(command: EvaluateCommand, config: Readonly<Config>): number {
  const runs = command.results.map((resultsPath) => loadExtractionResults(resultsPath));
  const outputDir = command.outputDir ?? defaultOutputDir(command.results[0]);

  evaluateAndReport(runs, command.reference, outputDir, config);
  return 0;
}

async function main(argv: readonly string[]): Promise<number> {
  const parsed = parseCommand(argv);
  if (!parsed.ok) {
    process.stderr.write(`${parsed.error}\n\n${USAGE}\n`);
    return 2;
  }

  const config = loadConfig();
  const command = parsed.value;

  switch (command.kind) {
    case 'run':
      return runCommand(command, config);
    case 'enqueue':
      return enqueueCommand(command, config);
    case 'evaluate':
      return evaluateCommand(command, config);
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Extraction runner failed', error);
    process.exitCode = 1;
  });
