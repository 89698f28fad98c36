import { ErrorCode } from '../types';
import { IAction, ActionResult } from '../interfaces/Action';
import { ISensor } from '../interfaces/Sensor';
import { Position } from '../state/position';

/**
 * Base for single-cell moves. The step is computed on a copy of the
 * position and committed only after every sensor accepts the new cell,
 * so a rejected move leaves the caller's position as it was.
 */
abstract class MoveAction implements IAction {
  protected abstract step(candidate: Position): void;

  execute(position: Position, sensors: readonly ISensor[]): ActionResult {
    const candidate = position.clone();
    this.step(candidate);

    for (let i = 0; i < sensors.length; i++) {
      if (!candidate.isSafeFor(sensors[i])) {
        const { x, y } = candidate.getCoordinates();
        return {
          success: false,
          failure: { code: ErrorCode.DangerousField, x, y, sensorIndex: i },
        };
      }
    }

    position.assign(candidate);
    return { success: true };
  }
}

export class MoveForward extends MoveAction {
  protected step(candidate: Position): void {
    candidate.moveForward();
  }
}

export class MoveBackward extends MoveAction {
  // Turn around, step, turn back: heading is unchanged afterwards
  protected step(candidate: Position): void {
    candidate.rotateForward();
    candidate.rotateForward();
    candidate.moveForward();
    candidate.rotateForward();
    candidate.rotateForward();
  }
}
