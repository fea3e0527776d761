/**
 * Aggregator logger - backend-common logger scoped to this package.
 * Wrap work in LogContext.run() to attach run identifiers.
 */

import { createLogger, LogContext, ContextAwareLogger } from '@todo-aggregator/backend-common';

export const logger = new ContextAwareLogger(createLogger('aggregator-core'));

export { LogContext };
