export type WorkoutErrorCode =
  | 'UNKNOWN_WORKOUT_TYPE'
  | 'ARITY_MISMATCH'
  | 'INVALID_WORKOUT_DATA'
  | 'UNIMPLEMENTED_OPERATION';

export class WorkoutError extends Error {
  readonly code: WorkoutErrorCode;
  readonly meta: Record<string, unknown>;

  constructor(code: WorkoutErrorCode, message: string, meta: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.meta = meta;
  }
}

export class UnknownWorkoutTypeError extends WorkoutError {
  constructor(workoutType: string, expected: readonly string[]) {
    super(
      'UNKNOWN_WORKOUT_TYPE',
      `Unknown workout type "${workoutType}". Expected one of: ${expected.join(', ')}`,
      { workoutType, expected: [...expected] }
    );
  }
}

export class ArityMismatchError extends WorkoutError {
  constructor(workoutType: string, expected: number, received: number) {
    super(
      'ARITY_MISMATCH',
      `Workout type ${workoutType} expects ${expected} values, got ${received}`,
      { workoutType, expected, received }
    );
  }
}

export class InvalidWorkoutDataError extends WorkoutError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_WORKOUT_DATA', `Invalid workout data: ${issues.join('; ')}`, { issues });
    this.issues = issues;
  }
}

export class UnimplementedOperationError extends WorkoutError {
  constructor(trainingType: string, operation: string) {
    super(
      'UNIMPLEMENTED_OPERATION',
      `${trainingType} does not implement ${operation}()`,
      { trainingType, operation }
    );
  }
}
