import { InfoMessage } from '../domain/info-message.js';
import { UnimplementedOperationError } from '../domain/errors.js';

export const M_IN_KM = 1000;
export const MIN_IN_H = 60;

export abstract class Training {
  abstract readonly trainingType: string;

  // meters covered per step or stroke
  protected readonly stepLength: number = 0.65;

  constructor(
    readonly action: number,
    readonly duration: number,
    readonly weight: number
  ) {}

  getDistance(): number {
    return this.action * this.stepLength / M_IN_KM;
  }

  getMeanSpeed(): number {
    return this.getDistance() / this.duration;
  }

  getSpentCalories(): number {
    throw new UnimplementedOperationError(this.trainingType, 'getSpentCalories');
  }

  showTrainingInfo(): InfoMessage {
    return new InfoMessage(
      this.trainingType,
      this.duration,
      this.getDistance(),
      this.getMeanSpeed(),
      this.getSpentCalories()
    );
  }
}

const RUN_SPEED_MULTIPLIER = 18;
const RUN_SPEED_SHIFT = 1.79;

export class Running extends Training {
  readonly trainingType = 'Running';

  getSpentCalories(): number {
    const speed = this.getMeanSpeed();
    return (RUN_SPEED_MULTIPLIER * speed + RUN_SPEED_SHIFT)
      * this.weight / M_IN_KM * this.duration * MIN_IN_H;
  }
}

const KMH_IN_MS = 0.278;
const CM_IN_M = 100;
const WALK_WEIGHT_MULTIPLIER = 0.035;
const WALK_SPEED_HEIGHT_MULTIPLIER = 0.029;

export class SportsWalking extends Training {
  readonly trainingType = 'SportsWalking';

  constructor(action: number, duration: number, weight: number, readonly height: number) {
    super(action, duration, weight);
  }

  getSpentCalories(): number {
    const speedMs = this.getMeanSpeed() * KMH_IN_MS;
    return (
      WALK_WEIGHT_MULTIPLIER * this.weight
      + (speedMs ** 2 / (this.height / CM_IN_M)) * WALK_SPEED_HEIGHT_MULTIPLIER * this.weight
    ) * this.duration * MIN_IN_H;
  }
}

const SWIM_SPEED_SHIFT = 1.1;
const SWIM_WEIGHT_MULTIPLIER = 2;

export class Swimming extends Training {
  readonly trainingType = 'Swimming';
  protected readonly stepLength = 1.38;

  constructor(
    action: number,
    duration: number,
    weight: number,
    readonly lengthPool: number,
    readonly countPool: number
  ) {
    super(action, duration, weight);
  }

  // pool laps, not strokes
  getMeanSpeed(): number {
    return this.lengthPool * this.countPool / M_IN_KM / this.duration;
  }

  getSpentCalories(): number {
    return (this.getMeanSpeed() + SWIM_SPEED_SHIFT) * SWIM_WEIGHT_MULTIPLIER * this.weight * this.duration;
  }
}
