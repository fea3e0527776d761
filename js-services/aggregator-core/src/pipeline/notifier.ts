import { logger } from '../logger';
import type { RunReport } from './AggregationPipeline';

/**
 * Receives the report of every run, successful or not
 */
export interface RunNotifier {
  notify(report: RunReport): Promise<void>;
}

export class LoggingRunNotifier implements RunNotifier {
  async notify(report: RunReport): Promise<void> {
    if (report.status === 'failed') {
      logger.error('Todo aggregation run failed', undefined, {
        runId: report.runId,
        failures: report.failures.map((failure) => failure.message),
      });
      return;
    }

    logger.info('Todo aggregation run finished', {
      runId: report.runId,
      ...report.summary,
      warnings: report.warnings.length,
    });
  }
}
