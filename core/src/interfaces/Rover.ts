import { Direction, ExecutionReport } from '../types';
import { Position } from '../state/position';

export interface IRover {
  land(x: number, y: number, direction: Direction): void;
  execute(commands: string): ExecutionReport;
  isLanded(): boolean;
  isStopped(): boolean;
  getPosition(): Position | null;
  getCommandNames(): string[];
  toString(): string;
}
