import type { WorkoutPackage } from '../domain/workout-package.js';
import { readPackage } from '../engine/read-package.js';
import { report } from '../services/reporter.js';
import { errorMeta, logError, logInfo } from '../utils/logger.js';

export interface RunOptions {
  continueOnError?: boolean;
  verbose?: boolean;
}

export interface RunResult {
  processed: number;
  failed: number;
}

export function runPackages(packages: readonly WorkoutPackage[], options: RunOptions = {}): RunResult {
  const result: RunResult = { processed: 0, failed: 0 };

  packages.forEach(({ workoutType, data }, index) => {
    try {
      const training = readPackage(workoutType, data);
      if (options.verbose) {
        logInfo('workout package parsed', { index, workoutType, trainingType: training.trainingType });
      }
      report(training);
      result.processed++;
    } catch (err) {
      if (!options.continueOnError) throw err;
      result.failed++;
      logError('workout package failed', { index, workoutType, ...errorMeta(err) });
    }
  });

  return result;
}
