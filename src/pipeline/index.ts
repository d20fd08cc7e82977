export { SchemaIntrospector, renderSchemaText, SCHEMA_DOCUMENT_HEADER } from './schema-introspector.js';
export { buildSqlPrompt, buildQueryAssistantPrompt, buildAnalysisTaskPrompt } from './prompt-builder.js';
export { OllamaClient, cleanSqlResponse, type ModelClientOptions } from './model-client.js';
export { QueryExecutor, isReadStatement } from './query-executor.js';
export {
  formatCell,
  formatRowsTable,
  parseTableHeader,
  formatOutcome,
  toStructuredData,
  formatTableList,
  formatTableDetails,
  formatSampleData,
  formatLookup,
  NO_RESULTS_MESSAGE,
} from './result-formatter.js';
export {
  QueryPipeline,
  createPipeline,
  DEFAULT_SAMPLE_LIMIT,
  type PipelineDependencies,
} from './query-pipeline.js';
