import type { ProtocolStatistics, StatisticsSnapshot } from '../protocol/statistics';
import type { Logger } from '../logging/logger';
import { delay } from './transport';

export interface StatisticsReporterOptions {
  statistics: ProtocolStatistics;
  /** 0 disables reporting */
  intervalMs: number;
  logger: Logger;
  onSnapshot?: (snapshot: Readonly<StatisticsSnapshot>) => void;
}

/**
 * Log a statistics summary every interval until the signal aborts.
 */
export async function runStatisticsReporter(options: StatisticsReporterOptions, signal: AbortSignal): Promise<void> {
  const { statistics, intervalMs, logger, onSnapshot } = options;
  if (intervalMs <= 0) {
    return;
  }

  while (!signal.aborted) {
    await delay(intervalMs, signal);
    if (signal.aborted) {
      break;
    }

    logger.info(`📊 ${statistics.summary()}`);
    onSnapshot?.(statistics.snapshot());
  }
}
