import { Direction } from '../types';
import { Compass } from '../geometry/Compass';
import { Coordinates } from '../geometry/Coordinates';
import { ISensor } from '../interfaces/Sensor';

export class Position {
  constructor(
    private coordinates: Coordinates,
    private direction: Direction
  ) {}

  getCoordinates(): Coordinates {
    return this.coordinates;
  }

  getDirection(): Direction {
    return this.direction;
  }

  rotateForward(): void {
    this.direction = Compass.next(this.direction);
  }

  // Raw geometric step, sensors are consulted by the move actions
  moveForward(): void {
    this.coordinates = this.coordinates.translate(Compass.unitVector(this.direction));
  }

  isSafeFor(sensor: ISensor): boolean {
    return sensor.isSafe(this.coordinates.x, this.coordinates.y);
  }

  clone(): Position {
    return new Position(this.coordinates, this.direction);
  }

  assign(other: Position): void {
    this.coordinates = other.coordinates;
    this.direction = other.direction;
  }

  toString(): string {
    return `${this.coordinates} ${Compass.nameOf(this.direction)}`;
  }
}
