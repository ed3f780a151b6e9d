export type * from './types.js';

export {
  createRequestId,
  createRunId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export {
  redactAddress,
  redactSecrets,
  safeSnippet,
} from './redaction.js';
