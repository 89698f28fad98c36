import EventEmitter from 'eventemitter3';
import { Direction, ExecutionReport, RoverEvent, StopReason } from '../types';
import { Coordinates } from '../geometry/Coordinates';
import { IAction } from '../interfaces/Action';
import { IRover } from '../interfaces/Rover';
import { ISensor } from '../interfaces/Sensor';
import { Position } from '../state/position';
import { Logger } from '../utils/logger';
import { RoverDidNotLandError } from '../utils/error-handler';

export interface RoverEvents {
  [RoverEvent.Landed]: (position: string) => void;
  [RoverEvent.CommandExecuted]: (command: string, position: string) => void;
  [RoverEvent.Stopped]: (report: ExecutionReport) => void;
}

export class Rover extends EventEmitter<RoverEvents> implements IRover {
  // null until the rover lands
  private position: Position | null = null;
  private stopped: boolean = false;
  private readonly commands: ReadonlyMap<string, IAction>;
  private readonly sensors: readonly ISensor[];

  constructor(
    commands: ReadonlyMap<string, IAction>,
    sensors: readonly ISensor[],
    private logger: Logger = new Logger('Rover')
  ) {
    super();
    this.commands = new Map(commands);
    this.sensors = [...sensors];
  }

  land(x: number, y: number, direction: Direction): void {
    this.position = new Position(new Coordinates(x, y), direction);
    this.stopped = false;

    this.logger.debug(`Landed at ${this.position}`);
    this.emit(RoverEvent.Landed, this.position.toString());
  }

  /**
   * Runs the command string left to right against the command table.
   * An unbound character or a move rejected by a sensor stops the rover
   * on the last position reached; the remaining characters are skipped.
   *
   * @throws RoverDidNotLandError when called before land()
   */
  execute(commands: string): ExecutionReport {
    const position = this.position;
    if (!position) {
      throw new RoverDidNotLandError();
    }

    this.stopped = false;
    let index = 0;

    for (const command of commands) {
      const action = this.commands.get(command);
      if (!action) {
        return this.stop('unknown_command', command, index);
      }

      const result = action.execute(position, this.sensors);
      if (!result.success) {
        const { x, y } = result.failure;
        this.logger.debug(`Command '${command}' rejected: dangerous field at (${x}, ${y})`);
        return this.stop('dangerous_field', command, index);
      }

      this.emit(RoverEvent.CommandExecuted, command, position.toString());
      index++;
    }

    this.logger.debug(`Executed ${index} command(s), now at ${position}`);
    return { executed: index, stopped: false };
  }

  isLanded(): boolean {
    return this.position !== null;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  getPosition(): Position | null {
    return this.position ? this.position.clone() : null;
  }

  getCommandNames(): string[] {
    return [...this.commands.keys()];
  }

  toString(): string {
    if (!this.position) {
      return 'unknown';
    }
    return this.stopped ? `${this.position} stopped` : this.position.toString();
  }

  private stop(reason: StopReason, command: string, index: number): ExecutionReport {
    this.stopped = true;
    const report: ExecutionReport = { executed: index, stopped: true, reason, command, index };

    this.logger.debug(`Stopped at ${this.position} (${reason} '${command}' at ${index})`);
    this.emit(RoverEvent.Stopped, report);
    return report;
  }
}
