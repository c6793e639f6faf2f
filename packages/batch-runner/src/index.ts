export {
  BatchRunner,
  type BatchRunnerOptions,
  type RunOptions,
  type TextSource,
} from './batch-runner';
export {
  DOCUMENT_EXTENSION,
  findDocuments,
  type FindDocumentsOptions,
} from './discovery/document-finder';
export {
  BatchRunError,
  DirectoryNotFoundError,
  NoInputError,
} from './errors/batch-run-error';
export {
  RESULT_SET_INDENT,
  serializeResultSet,
  writeResultSet,
} from './output/result-writer';
