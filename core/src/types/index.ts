// Compass headings, ordered clockwise
export enum Direction {
  North = 'NORTH',
  East = 'EAST',
  South = 'SOUTH',
  West = 'WEST'
}

export interface ICoordinates {
  x: number;
  y: number;
}

// Error types
export enum ErrorCode {
  DangerousField = 'DANGEROUS_FIELD',
  RoverDidNotLand = 'ROVER_DID_NOT_LAND',
  InvalidConfig = 'INVALID_CONFIG',
  InvalidLanding = 'INVALID_LANDING',
  InvalidCommandName = 'INVALID_COMMAND_NAME',
  UnknownAction = 'UNKNOWN_ACTION',
  UnknownSensor = 'UNKNOWN_SENSOR'
}

// Action specs as they appear in a rover configuration file
export enum ActionName {
  Forward = 'forward',
  Backward = 'backward',
  Left = 'left',
  Right = 'right'
}

export type ActionSpec = ActionName | ActionSpec[];

// Sensor types
export enum SensorType {
  Boundary = 'boundary',
  Obstacles = 'obstacles'
}

export interface BoundarySensorConfig {
  type: SensorType.Boundary;
  min: ICoordinates;
  max: ICoordinates;
}

export interface ObstacleSensorConfig {
  type: SensorType.Obstacles;
  cells: ICoordinates[];
}

export type SensorConfig = BoundarySensorConfig | ObstacleSensorConfig;

export interface LandingConfig extends ICoordinates {
  direction: Direction;
}

export interface RoverConfig {
  commands: Record<string, ActionSpec>;
  sensors: SensorConfig[];
  landing?: LandingConfig;
}

// Rover events
export enum RoverEvent {
  Landed = 'landed',
  CommandExecuted = 'commandExecuted',
  Stopped = 'stopped'
}

export type StopReason = 'unknown_command' | 'dangerous_field';

export interface ExecutionReport {
  executed: number;
  stopped: boolean;
  reason?: StopReason;
  command?: string;
  index?: number;
}
