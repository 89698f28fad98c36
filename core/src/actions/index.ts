import { IAction } from '../interfaces/Action';
import { Compose } from './Compose';
import { MoveBackward, MoveForward } from './MoveActions';
import { RotateLeft, RotateRight } from './RotateActions';

export { Compose } from './Compose';
export { MoveBackward, MoveForward } from './MoveActions';
export { RotateLeft, RotateRight } from './RotateActions';
export { ActionFactory } from './ActionFactory';

export const moveForward = (): MoveForward => new MoveForward();
export const moveBackward = (): MoveBackward => new MoveBackward();
export const rotateLeft = (): RotateLeft => new RotateLeft();
export const rotateRight = (): RotateRight => new RotateRight();
export const compose = (actions: IAction[]): Compose => new Compose(actions);
