import { ActionName, ActionSpec, ErrorCode } from '../types';
import { IAction } from '../interfaces/Action';
import { RoverError } from '../utils/error-handler';
import { Compose } from './Compose';
import { MoveBackward, MoveForward } from './MoveActions';
import { RotateLeft, RotateRight } from './RotateActions';

export class ActionFactory {
  static create(spec: ActionSpec): IAction {
    if (Array.isArray(spec)) {
      return new Compose(spec.map(child => this.create(child)));
    }

    switch (spec) {
      case ActionName.Forward:
        return new MoveForward();
      case ActionName.Backward:
        return new MoveBackward();
      case ActionName.Left:
        return new RotateLeft();
      case ActionName.Right:
        return new RotateRight();
      default: {
        const unknown: never = spec;
        throw new RoverError(ErrorCode.UnknownAction, `Unknown action: ${String(unknown)}`);
      }
    }
  }

  static isActionName(value: unknown): value is ActionName {
    return Object.values(ActionName).some(name => name === value);
  }
}
