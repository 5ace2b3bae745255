import type { AppConfig } from './config.js';
import { SAMPLE_PACKAGES } from './domain/workout-package.js';
import { runPackages } from './jobs/run-packages.js';
import { parsePackageArgs } from './utils/parse-package.js';
import { errorMeta, logError } from './utils/logger.js';

// Returns the process exit code.
export function main(argv: readonly string[], config: AppConfig): number {
  try {
    const packages = argv.length ? parsePackageArgs(argv) : SAMPLE_PACKAGES;
    const { failed } = runPackages(packages, config);
    return failed > 0 ? 1 : 0;
  } catch (err) {
    logError('workout run aborted', errorMeta(err));
    return 1;
  }
}
