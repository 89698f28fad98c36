import { Direction } from '../types';
import { Coordinates } from './Coordinates';

// Clockwise order; the successor of the last entry wraps to the first
const HEADINGS: readonly Direction[] = [
  Direction.North,
  Direction.East,
  Direction.South,
  Direction.West,
];

const UNIT_VECTORS: Record<Direction, Coordinates> = {
  [Direction.North]: new Coordinates(0, 1),
  [Direction.East]: new Coordinates(1, 0),
  [Direction.South]: new Coordinates(0, -1),
  [Direction.West]: new Coordinates(-1, 0),
};

export class Compass {
  static readonly headings = HEADINGS;

  static next(direction: Direction): Direction {
    const index = HEADINGS.indexOf(direction);
    return HEADINGS[(index + 1) % HEADINGS.length];
  }

  static unitVector(direction: Direction): Coordinates {
    return UNIT_VECTORS[direction];
  }

  static nameOf(direction: Direction): string {
    return direction;
  }

  // Case-insensitive lookup by display name
  static parse(name: string): Direction | null {
    const upper = name.trim().toUpperCase();
    return HEADINGS.find(heading => heading === upper) ?? null;
  }
}
