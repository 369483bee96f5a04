export { loadConfig } from './config.js';
export type { AppConfig, Env, OracleConfig, SearchConfig, TicketSinkConfig, ReportSinkConfig } from './config.js';
export { createLogger } from './logger.js';
export { createJudgmentOracle, disabledOracle, isRateLimitError } from './oracle/judgment-oracle.js';
export type { Completion, CompletionTransport, RetryPolicy } from './oracle/judgment-oracle.js';
export { createBedrockTransport } from './oracle/bedrock-transport.js';
export { parseJsonResponse } from './oracle/json-response.js';
export * from './store/index.js';
export * from './sources/index.js';
export * from './sinks/index.js';
export { ConsoleDecisionPort, formatDraft, parseChoice } from './console-decision-port.js';
