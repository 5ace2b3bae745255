import { z } from 'zod';
import { Running, SportsWalking, Swimming, type Training } from './trainings.js';
import { ArityMismatchError, InvalidWorkoutDataError, UnknownWorkoutTypeError } from '../domain/errors.js';

const count = z.number().finite().int().nonnegative();
const positive = z.number().finite().positive();

const RunningSchema = z.object({ action: count, duration: positive, weight: positive });
const SportsWalkingSchema = RunningSchema.extend({ height: positive });
const SwimmingSchema = RunningSchema.extend({ lengthPool: positive, countPool: count });

interface WorkoutVariant {
  fields: readonly string[];
  build: (fields: Record<string, number>) => Training;
}

function workoutVariant<T>(
  schema: z.ZodType<T>,
  fields: readonly string[],
  create: (data: T) => Training
): WorkoutVariant {
  return {
    fields,
    build: (record) => {
      const parsed = schema.safeParse(record);
      if (!parsed.success) {
        throw new InvalidWorkoutDataError(
          parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
      }
      return create(parsed.data);
    }
  };
}

// Order matters: it is the order listed in UnknownWorkoutTypeError.
export const WORKOUT_CODES = ['RUN', 'SWM', 'WLK'] as const;
export type WorkoutCode = (typeof WORKOUT_CODES)[number];

const WORKOUT_TYPES: Record<WorkoutCode, WorkoutVariant> = {
  RUN: workoutVariant(
    RunningSchema,
    Object.keys(RunningSchema.shape),
    (d) => new Running(d.action, d.duration, d.weight)
  ),
  SWM: workoutVariant(
    SwimmingSchema,
    Object.keys(SwimmingSchema.shape),
    (d) => new Swimming(d.action, d.duration, d.weight, d.lengthPool, d.countPool)
  ),
  WLK: workoutVariant(
    SportsWalkingSchema,
    Object.keys(SportsWalkingSchema.shape),
    (d) => new SportsWalking(d.action, d.duration, d.weight, d.height)
  )
};

export function isWorkoutCode(code: string): code is WorkoutCode {
  return WORKOUT_CODES.some((known) => known === code);
}

export function readPackage(workoutType: string, data: readonly number[]): Training {
  if (!isWorkoutCode(workoutType)) {
    throw new UnknownWorkoutTypeError(workoutType, WORKOUT_CODES);
  }
  const variant = WORKOUT_TYPES[workoutType];
  if (data.length !== variant.fields.length) {
    throw new ArityMismatchError(workoutType, variant.fields.length, data.length);
  }
  const fields: Record<string, number> = {};
  variant.fields.forEach((name, i) => {
    fields[name] = data[i];
  });
  return variant.build(fields);
}
