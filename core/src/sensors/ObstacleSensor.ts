import { ICoordinates } from '../types';
import { ISensor } from '../interfaces/Sensor';

export class ObstacleSensor implements ISensor {
  private obstacles = new Set<string>();

  constructor(cells: readonly ICoordinates[] = []) {
    cells.forEach(cell => this.addObstacle(cell));
  }

  addObstacle(cell: ICoordinates): void {
    this.obstacles.add(this.key(cell.x, cell.y));
  }

  removeObstacle(cell: ICoordinates): boolean {
    return this.obstacles.delete(this.key(cell.x, cell.y));
  }

  isSafe(x: number, y: number): boolean {
    return !this.obstacles.has(this.key(x, y));
  }

  private key(x: number, y: number): string {
    return `${x},${y}`;
  }
}
