import { createLogger, ContextAwareLogger } from '@todo-aggregator/backend-common';

export const logger = new ContextAwareLogger(createLogger('aggregator-cli'));
