// Types
export * from './types';

// Geometry and state
export * from './geometry';
export { Position } from './state/position';

// Interfaces
export type { ISensor } from './interfaces/Sensor';
export type { IAction, ActionResult, DangerousField } from './interfaces/Action';
export type { IRover } from './interfaces/Rover';

// Actions
export * from './actions';

// Sensors
export * from './sensors';

// Rover
export * from './rover';

// Configuration
export * from './config';

// Console
export { ControlSession, SESSION_HELP } from './console/ControlSession';
export type { SessionReply } from './console/ControlSession';

// Utilities
export { Logger } from './utils/logger';
export { ErrorHandler, RoverError, RoverDidNotLandError, ConfigurationError } from './utils/error-handler';
