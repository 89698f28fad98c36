import { ErrorCode } from '../types';
import { Position } from '../state/position';
import { ISensor } from './Sensor';

export interface DangerousField {
  code: ErrorCode.DangerousField;
  x: number;
  y: number;
  sensorIndex: number;
}

export type ActionResult =
  | { success: true }
  | { success: false; failure: DangerousField };

export interface IAction {
  execute(position: Position, sensors: readonly ISensor[]): ActionResult;
}
