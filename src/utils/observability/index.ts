export type * from './types.js';

export {
  createRunId,
  withBatchContext,
  withLogContext,
  withRunContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export { redactSecrets } from './redaction.js';
