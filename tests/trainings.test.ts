import { describe, it, expect } from 'vitest';
import { Running, SportsWalking, Swimming, Training } from '../src/engine/trainings.js';
import { UnimplementedOperationError } from '../src/domain/errors.js';

class Cycling extends Training {
  readonly trainingType = 'Cycling';
}

describe('trainings', () => {
  it('running uses 0.65 m per step', () => {
    const run = new Running(5000, 0.5, 70);
    expect(run.getDistance()).toBeCloseTo(3.25, 9);
    expect(run.getMeanSpeed()).toBeCloseTo(6.5, 9);
  });

  it('running calories', () => {
    const run = new Running(15000, 1, 75);
    expect(run.getSpentCalories()).toBeCloseTo(797.805, 6);
  });

  it('walking calories depend on height', () => {
    const walk = new SportsWalking(9000, 1, 75, 180);
    expect(walk.getDistance()).toBeCloseTo(5.85, 9);
    expect(walk.getMeanSpeed()).toBeCloseTo(5.85, 9);
    expect(walk.getSpentCalories()).toBeCloseTo(349.2517, 3);

    const taller = new SportsWalking(9000, 1, 75, 200);
    expect(taller.getSpentCalories()).toBeLessThan(walk.getSpentCalories());
  });

  it('swimming uses 1.38 m per stroke for distance', () => {
    const swim = new Swimming(720, 1, 80, 25, 40);
    expect(swim.getDistance()).toBeCloseTo(0.9936, 9);
    expect(swim.getMeanSpeed()).toBeCloseTo(1, 9);
    expect(swim.getSpentCalories()).toBeCloseTo(336, 9);
  });

  it('swimming speed ignores strokes', () => {
    const few = new Swimming(100, 1, 80, 25, 40);
    const many = new Swimming(5000, 1, 80, 25, 40);
    expect(few.getMeanSpeed()).toBe(many.getMeanSpeed());
    expect(few.getDistance()).toBeCloseTo(0.138, 9);
  });

  it('builds summary from the variant name', () => {
    const info = new Running(15000, 1, 75).showTrainingInfo();
    expect(info.trainingType).toBe('Running');
    expect(info.duration).toBe(1);
    expect(info.distance).toBeCloseTo(9.75, 9);
    expect(info.speed).toBeCloseTo(9.75, 9);
    expect(info.calories).toBeCloseTo(797.805, 6);
  });

  it('fails when a variant has no calorie formula', () => {
    const ride = new Cycling(1000, 1, 70);
    expect(() => ride.getSpentCalories()).toThrow(UnimplementedOperationError);
    expect(() => ride.showTrainingInfo()).toThrow('Cycling does not implement getSpentCalories()');
  });

  it('does not guard zero duration when constructed directly', () => {
    const run = new Running(1000, 0, 70);
    expect(run.getMeanSpeed()).toBe(Infinity);
  });
});
