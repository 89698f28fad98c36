import { ICoordinates } from '../types';
import { ISensor } from '../interfaces/Sensor';

// Soft limits: every cell of the inclusive rectangle [min, max] is safe
export class BoundarySensor implements ISensor {
  private readonly min: ICoordinates;
  private readonly max: ICoordinates;

  constructor(min: ICoordinates, max: ICoordinates) {
    this.min = { x: Math.min(min.x, max.x), y: Math.min(min.y, max.y) };
    this.max = { x: Math.max(min.x, max.x), y: Math.max(min.y, max.y) };
  }

  isSafe(x: number, y: number): boolean {
    return (
      x >= this.min.x &&
      x <= this.max.x &&
      y >= this.min.y &&
      y <= this.max.y
    );
  }
}
