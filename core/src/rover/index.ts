export { Rover } from './Rover';
export type { RoverEvents } from './Rover';
export { RoverBuilder } from './RoverBuilder';
