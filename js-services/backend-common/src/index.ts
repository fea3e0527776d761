export {
  createLogger,
  LogContext,
  ContextAwareLogger,
  safeStringify,
  type LogSink,
} from './logger';
