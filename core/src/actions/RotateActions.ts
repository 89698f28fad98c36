import { IAction, ActionResult } from '../interfaces/Action';
import { ISensor } from '../interfaces/Sensor';
import { Position } from '../state/position';

// Rotations never consult sensors and cannot fail

export class RotateRight implements IAction {
  execute(position: Position, _sensors: readonly ISensor[]): ActionResult {
    position.rotateForward();
    return { success: true };
  }
}

export class RotateLeft implements IAction {
  execute(position: Position, _sensors: readonly ISensor[]): ActionResult {
    // Three quarter turns clockwise
    position.rotateForward();
    position.rotateForward();
    position.rotateForward();
    return { success: true };
  }
}
