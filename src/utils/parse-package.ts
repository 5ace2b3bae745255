import type { WorkoutPackage } from '../domain/workout-package.js';
import { InvalidWorkoutDataError } from '../domain/errors.js';

// plain decimals with an optional exponent; no hex, binary or separators
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

// "RUN:15000,1,75" -> { workoutType: 'RUN', data: [15000, 1, 75] }
export function parsePackageArg(arg: string): WorkoutPackage {
  const sep = arg.indexOf(':');
  if (sep <= 0) {
    throw new InvalidWorkoutDataError([`"${arg}": expected CODE:value,value,...`]);
  }
  const workoutType = arg.slice(0, sep).trim().toUpperCase();
  const rawValues = arg.slice(sep + 1).split(',').map((v) => v.trim());

  const issues: string[] = [];
  const data = rawValues.map((raw, i) => {
    const value = DECIMAL.test(raw) ? Number(raw) : NaN;
    if (!Number.isFinite(value)) issues.push(`value ${i + 1}: "${raw}" is not a number`);
    return value;
  });
  if (issues.length) throw new InvalidWorkoutDataError(issues);

  return { workoutType, data };
}

export function parsePackageArgs(args: readonly string[]): WorkoutPackage[] {
  return args.map(parsePackageArg);
}
