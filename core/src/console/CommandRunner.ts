import path from 'path';
import { Direction, ErrorCode, ExecutionReport, LandingConfig, RoverConfig } from '../types';
import { Compass } from '../geometry/Compass';
import { Coordinates } from '../geometry/Coordinates';
import { RoverBuilder } from '../rover/RoverBuilder';
import { RoverError } from '../utils/error-handler';

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/rover.json');

// Raw flag values as commander hands them over
export interface LandingOverrides {
  x?: string;
  y?: string;
  direction?: string;
}

export interface RunResult {
  landing: string;
  output: string;
  report: ExecutionReport;
  stopped: boolean;
  exitCode: number;
}

export function resolveConfigPath(
  option: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return option ?? env.ROVER_CONFIG ?? DEFAULT_CONFIG_PATH;
}

/**
 * Landing position from the config, with each flag taking precedence
 * over the matching config field. Missing values fall back to (0, 0) NORTH.
 *
 * @throws RoverError INVALID_LANDING on a non-integer coordinate or an unknown direction
 */
export function resolveLanding(config: RoverConfig, overrides: LandingOverrides = {}): LandingConfig {
  const x = overrides.x !== undefined ? Coordinates.parseComponent(overrides.x) : config.landing?.x ?? 0;
  const y = overrides.y !== undefined ? Coordinates.parseComponent(overrides.y) : config.landing?.y ?? 0;
  const direction =
    overrides.direction !== undefined
      ? Compass.parse(overrides.direction)
      : config.landing?.direction ?? Direction.North;

  if (x === null || y === null) {
    throw new RoverError(
      ErrorCode.InvalidLanding,
      `Landing coordinates must be integers, got x=${overrides.x ?? x} y=${overrides.y ?? y}`
    );
  }
  if (!direction) {
    throw new RoverError(ErrorCode.InvalidLanding, `Unknown direction: ${overrides.direction}`);
  }
  return { x, y, direction };
}

export function runCommandString(
  config: RoverConfig,
  commands: string,
  overrides: LandingOverrides = {}
): RunResult {
  const { x, y, direction } = resolveLanding(config, overrides);
  const rover = RoverBuilder.fromConfig(config).build();

  rover.land(x, y, direction);
  const landing = rover.toString();
  const report = rover.execute(commands);

  return {
    landing,
    output: rover.toString(),
    report,
    stopped: report.stopped,
    exitCode: report.stopped ? 1 : 0,
  };
}
