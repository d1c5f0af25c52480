import { logAppState, log } from './utils/logger.js';
import { describeError } from './errors.js';

// Milliseconds until the next listed UTC hour, on the hour
export function calculateNextRunDelay(hours: number[], now: Date = new Date()): number {
  const sorted = [...hours].sort((a, b) => a - b);
  if (sorted.length === 0) {
    throw new Error('At least one schedule hour is required');
  }

  const currentUTCHour = now.getUTCHours();
  const nextHour = sorted.find(hour => hour > currentUTCHour);

  const targetTime = new Date(now);
  if (nextHour === undefined) {
    targetTime.setUTCDate(targetTime.getUTCDate() + 1);
    targetTime.setUTCHours(sorted[0], 0, 0, 0);
  } else {
    targetTime.setUTCHours(nextHour, 0, 0, 0);
  }

  return targetTime.getTime() - now.getTime();
}

export interface ScheduleHandle {
  stop(): void;
}

/**
 * Runs `task` at each listed UTC hour. The next timer is armed only after
 * the current run settles, so runs never overlap.
 */
export function scheduleAtUtcHours(hours: number[], task: () => Promise<void>): ScheduleHandle {
  let timer: NodeJS.Timeout | undefined;
  let stopped = false;

  const arm = () => {
    if (stopped) return;
    const delayMs = calculateNextRunDelay(hours);
    logAppState('CONFIG', {
      message: 'Next scheduled run',
      data: {
        nextRun: new Date(Date.now() + delayMs).toISOString(),
        delayMinutes: Math.round(delayMs / 1000 / 60)
      }
    });

    timer = setTimeout(() => {
      log('INFO', 'Running scheduled batch at UTC hour...');
      void task()
        .catch(error => log('ERROR', 'Scheduled run failed', describeError(error)))
        .finally(arm);
    }, delayMs);
  };

  arm();

  return {
    stop() {
      stopped = true;
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    }
  };
}
