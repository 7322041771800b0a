export { IngestionRunner } from './ingestion-runner'
export type {
  IngestionRunnerOptions,
  IngestionReport,
  SourceReport,
  SourceStatus,
} from './ingestion-runner'
