export interface WorkoutPackage {
  workoutType: string;
  data: number[];
}

export const SAMPLE_PACKAGES: readonly WorkoutPackage[] = [
  { workoutType: 'SWM', data: [720, 1, 80, 25, 40] },
  { workoutType: 'RUN', data: [15000, 1, 75] },
  { workoutType: 'WLK', data: [9000, 1, 75, 180] }
];
