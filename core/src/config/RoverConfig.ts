import fs from 'fs';
import {
  ActionSpec,
  ICoordinates,
  LandingConfig,
  RoverConfig,
  SensorConfig,
  SensorType,
} from '../types';
import { ActionFactory } from '../actions/ActionFactory';
import { Compass } from '../geometry/Compass';
import { ConfigurationError } from '../utils/error-handler';

export type ConfigValidationResult =
  | { isValid: true; config: RoverConfig }
  | { isValid: false; errors: string[] };

type JsonObject = Record<string, unknown>;

const isPresent = <T>(value: T | null): value is T => value !== null;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function validateRoverConfig(raw: unknown): ConfigValidationResult {
  const errors: string[] = [];

  if (!isObject(raw)) {
    return { isValid: false, errors: ['Configuration must be a JSON object'] };
  }

  // 1. Command table
  const commands: Record<string, ActionSpec> = {};
  if (!isObject(raw.commands)) {
    errors.push('"commands" must be an object mapping characters to actions');
  } else {
    for (const [name, value] of Object.entries(raw.commands)) {
      if ([...name].length !== 1) {
        errors.push(`Command name '${name}' must be a single character`);
        continue;
      }
      const spec = parseActionSpec(value, `commands.${name}`, errors);
      if (spec !== null) {
        commands[name] = spec;
      }
    }
  }

  // 2. Sensors
  const sensors: SensorConfig[] = [];
  if (raw.sensors !== undefined && !Array.isArray(raw.sensors)) {
    errors.push('"sensors" must be an array');
  } else if (Array.isArray(raw.sensors)) {
    raw.sensors.forEach((value: unknown, index: number) => {
      const sensor = parseSensor(value, `sensors[${index}]`, errors);
      if (sensor) {
        sensors.push(sensor);
      }
    });
  }

  // 3. Landing (optional)
  let landing: LandingConfig | undefined;
  if (raw.landing !== undefined) {
    landing = parseLanding(raw.landing, errors) ?? undefined;
  }

  if (errors.length > 0) {
    return { isValid: false, errors };
  }
  return { isValid: true, config: landing ? { commands, sensors, landing } : { commands, sensors } };
}

export function loadRoverConfig(filePath: string): RoverConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`Cannot read ${filePath}: ${reason}`]);
  }

  const result = validateRoverConfig(raw);
  if (!result.isValid) {
    throw new ConfigurationError(result.errors);
  }
  return result.config;
}

function parseActionSpec(value: unknown, path: string, errors: string[]): ActionSpec | null {
  if (Array.isArray(value)) {
    const children = value.map((child: unknown, index: number) =>
      parseActionSpec(child, `${path}[${index}]`, errors)
    );
    return children.every(isPresent) ? children : null;
  }

  if (ActionFactory.isActionName(value)) {
    return value;
  }

  errors.push(`${path}: unknown action ${JSON.stringify(value)}`);
  return null;
}

function parseCoordinates(value: unknown, path: string, errors: string[]): ICoordinates | null {
  if (isObject(value) && Number.isInteger(value.x) && Number.isInteger(value.y)) {
    return { x: Number(value.x), y: Number(value.y) };
  }
  errors.push(`${path}: expected integer "x" and "y"`);
  return null;
}

function parseSensor(value: unknown, path: string, errors: string[]): SensorConfig | null {
  if (!isObject(value)) {
    errors.push(`${path}: sensor must be an object`);
    return null;
  }

  switch (value.type) {
    case SensorType.Boundary: {
      const min = parseCoordinates(value.min, `${path}.min`, errors);
      const max = parseCoordinates(value.max, `${path}.max`, errors);
      return min && max ? { type: SensorType.Boundary, min, max } : null;
    }
    case SensorType.Obstacles: {
      if (!Array.isArray(value.cells)) {
        errors.push(`${path}.cells: must be an array`);
        return null;
      }
      const cells = value.cells.map((cell: unknown, index: number) =>
        parseCoordinates(cell, `${path}.cells[${index}]`, errors)
      );
      return cells.every(isPresent) ? { type: SensorType.Obstacles, cells } : null;
    }
    default:
      errors.push(`${path}: unknown sensor type ${JSON.stringify(value.type)}`);
      return null;
  }
}

function parseLanding(value: unknown, errors: string[]): LandingConfig | null {
  const coordinates = parseCoordinates(value, 'landing', errors);
  const name = isObject(value) && typeof value.direction === 'string' ? value.direction : '';
  const direction = Compass.parse(name);

  if (!direction) {
    errors.push(`landing.direction: expected one of ${Compass.headings.join(', ')}`);
    return null;
  }
  return coordinates ? { ...coordinates, direction } : null;
}
