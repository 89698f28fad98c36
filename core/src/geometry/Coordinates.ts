import { ICoordinates } from '../types';

export class Coordinates implements ICoordinates {
  constructor(
    public readonly x: number,
    public readonly y: number
  ) {}

  translate(delta: ICoordinates): Coordinates {
    return new Coordinates(this.x + delta.x, this.y + delta.y);
  }

  // Whole-string integer parse: "1.5", "3abc" and "" are rejected
  static parseComponent(text: string): number | null {
    const trimmed = text.trim();
    const value = Number(trimmed);
    return trimmed !== '' && Number.isInteger(value) ? value : null;
  }

  toString(): string {
    return `(${this.x}, ${this.y})`;
  }
}
