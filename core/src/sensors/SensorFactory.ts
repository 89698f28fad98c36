import { ErrorCode, SensorConfig, SensorType } from '../types';
import { ISensor } from '../interfaces/Sensor';
import { RoverError } from '../utils/error-handler';
import { BoundarySensor } from './BoundarySensor';
import { ObstacleSensor } from './ObstacleSensor';

export class SensorFactory {
  static create(config: SensorConfig): ISensor {
    switch (config.type) {
      case SensorType.Boundary:
        return new BoundarySensor(config.min, config.max);
      case SensorType.Obstacles:
        return new ObstacleSensor(config.cells);
      default: {
        const unsupported: never = config;
        throw new RoverError(
          ErrorCode.UnknownSensor,
          `Unsupported sensor type: ${JSON.stringify(unsupported)}`
        );
      }
    }
  }
}
