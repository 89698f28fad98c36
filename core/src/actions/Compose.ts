import { IAction, ActionResult } from '../interfaces/Action';
import { ISensor } from '../interfaces/Sensor';
import { Position } from '../state/position';

interface Frame {
  actions: readonly IAction[];
  next: number;
}

/**
 * Applies child actions in order to the same position and returns the
 * first failure. Children applied before the failure keep their effect.
 * Nested compositions are walked with an explicit stack.
 */
export class Compose implements IAction {
  private readonly actions: readonly IAction[];

  constructor(actions: readonly IAction[]) {
    this.actions = [...actions];
  }

  execute(position: Position, sensors: readonly ISensor[]): ActionResult {
    const stack: Frame[] = [{ actions: this.actions, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.actions.length) {
        stack.pop();
        continue;
      }

      const action = frame.actions[frame.next++];
      if (action instanceof Compose) {
        stack.push({ actions: action.actions, next: 0 });
        continue;
      }

      const result = action.execute(position, sensors);
      if (!result.success) {
        return result;
      }
    }

    return { success: true };
  }
}
