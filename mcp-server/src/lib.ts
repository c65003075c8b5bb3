export * from './errors.js';
export { getServerConfig, providerParametersFromConfig, type ServerConfig } from './config.js';
export { createAppContext, type AppContext } from './context.js';
export { createLogger, setLogLevel, maskSecrets, type Logger, type LogLevel } from './utils/logger.js';

export { buildMatchingPrompt, type PromptInput } from './matching/prompt-builder.js';
export { extractJsonObject, parseMatchingResponse, toMatchingResult } from './matching/response-parser.js';
export { REPAIR_RULES, repairJson, type RepairRule } from './matching/json-repair.js';
export { matchColumns, ensureCoverage, type MatchRequest } from './matching/orchestrator.js';

export * from './providers/index.js';

export {
  runColumnMatching,
  listAvailableProviders,
  type ColumnMatchingRequest,
  type ColumnMatchingOutcome,
  type RunColumnMatchingOptions,
} from './services/column-matching-service.js';
export {
  buildProviderConfiguration,
  configurationFingerprint,
  createModelConfiguration,
  type ProviderConfigurationInput,
  type ModelConfigurationInput,
} from './services/provider-configuration.js';
export {
  parseExistingMappingsJson,
  parseHeadersText,
  parseMappingsCsv,
  readHeadersFile,
  readMappingsCsv,
} from './services/mapping-loader.js';
export { MatchRequestBodySchema, toColumnMatchingRequest, type MatchRequestBody } from './services/request-schema.js';
export type { StageArtifact } from './services/stage-artifacts.js';
export { createHttpServer, startHttpServer } from './http/server.js';
export { createTools, handleToolCall } from './tools/index.js';
