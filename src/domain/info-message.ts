import { formatFixed3 } from '../utils/format-number.js';

export class InfoMessage {
  constructor(
    readonly trainingType: string,
    readonly duration: number,
    readonly distance: number,
    readonly speed: number,
    readonly calories: number
  ) {}

  getMessage(): string {
    return [
      `Тип тренировки: ${this.trainingType}`,
      `Длительность: ${formatFixed3(this.duration)} ч.`,
      `Дистанция: ${formatFixed3(this.distance)} км`,
      `Ср. скорость: ${formatFixed3(this.speed)} км/ч`,
      `Потрачено ккал: ${formatFixed3(this.calories)}.`
    ].join('; ');
  }
}
