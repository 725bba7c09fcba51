import { monitorEventLoopDelay, type IntervalHistogram } from 'perf_hooks';
import { logger } from './logger.js';

const LAG_CHECK_INTERVAL_MS = 10_000;
const DEFAULT_LAG_THRESHOLD_MS = 100;

let histogram: IntervalHistogram | null = null;
let checkInterval: ReturnType<typeof setInterval> | null = null;

/**
 * Start sampling event loop lag.
 * Sustained lag above ~100ms means capture chunks queue up faster than the
 * stages drain them, and subtitles fall behind the audio.
 */
export function startMonitoring(thresholdMs: number = DEFAULT_LAG_THRESHOLD_MS): void {
  if (histogram) return;

  // 20ms resolution
  histogram = monitorEventLoopDelay({ resolution: 20 });
  histogram.enable();

  checkInterval = setInterval(() => {
    if (!histogram) return;
    const p99Ms = histogram.percentile(99) / 1e6; // nanoseconds -> ms
    if (p99Ms > thresholdMs) {
      logger.warn(
        `Event loop lag: p99=${p99Ms.toFixed(1)}ms exceeds threshold ${thresholdMs}ms -- subtitles may fall behind`
      );
    }
    histogram.reset();
  }, LAG_CHECK_INTERVAL_MS);
  checkInterval.unref();

  logger.debug('Monitoring started (event loop lag)');
}

/** Current event loop lag p99 in ms, or null when monitoring is off. */
export function getEventLoopLagMs(): number | null {
  if (!histogram) return null;
  const p99 = histogram.percentile(99);
  // Empty histogram until the first sample lands
  return Number.isFinite(p99) ? Math.round((p99 / 1e6) * 10) / 10 : null;
}

export function stopMonitoring(): void {
  if (histogram) {
    histogram.disable();
    histogram = null;
  }
  if (checkInterval) {
    clearInterval(checkInterval);
    checkInterval = null;
  }
}
