import { ErrorCode, RoverConfig } from '../types';
import { ActionFactory } from '../actions/ActionFactory';
import { IAction } from '../interfaces/Action';
import { ISensor } from '../interfaces/Sensor';
import { SensorFactory } from '../sensors/SensorFactory';
import { Logger } from '../utils/logger';
import { RoverError } from '../utils/error-handler';
import { Rover } from './Rover';

export class RoverBuilder {
  private commands = new Map<string, IAction>();
  private sensors: ISensor[] = [];
  private logger?: Logger;

  static fromConfig(config: RoverConfig): RoverBuilder {
    const builder = new RoverBuilder();
    for (const [name, spec] of Object.entries(config.commands)) {
      builder.programCommand(name, ActionFactory.create(spec));
    }
    config.sensors.forEach(sensor => builder.addSensor(SensorFactory.create(sensor)));
    return builder;
  }

  // Rebinding a name replaces the previous action
  programCommand(name: string, action: IAction): this {
    if ([...name].length !== 1) {
      throw new RoverError(
        ErrorCode.InvalidCommandName,
        `Command name must be a single character, got '${name}'`
      );
    }
    this.commands.set(name, action);
    return this;
  }

  addSensor(sensor: ISensor): this {
    this.sensors.push(sensor);
    return this;
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  build(): Rover {
    return new Rover(this.commands, this.sensors, this.logger);
  }
}
