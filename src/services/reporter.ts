import type { Training } from '../engine/trainings.js';

export function report(training: Training): void {
  const info = training.showTrainingInfo();
  console.log(info.getMessage());
}
