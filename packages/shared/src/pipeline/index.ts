export { loadDocuments, loadDocument, getText, parseDocumentFileName, type ParsedDocumentName } from './documents';
export { mapWithConcurrency } from './pool';
export {
  runExtraction,
  runDocumentTask,
  sortOutcomes,
  type RunDeps,
  type RunOptions,
  type RunResult,
  type TaskOptions,
} from './runner';
export {
  RESULTS_FILE_NAME,
  groupOutcomes,
  loadExtractionResults,
  outcomeFileName,
  writeEvaluationReport,
  writeExtractionResults,
  writeOutcomeFile,
  type ExtractionResultsFile,
  type LoadedResults,
  type ResultsByTicker,
  type RunMetadata,
} from './results';
