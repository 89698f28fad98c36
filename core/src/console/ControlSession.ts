import { Compass } from '../geometry/Compass';
import { Coordinates } from '../geometry/Coordinates';
import { IRover } from '../interfaces/Rover';
import { ErrorHandler } from '../utils/error-handler';

export interface SessionReply {
  output: string;
  exit: boolean;
}

export const SESSION_HELP = [
  'land <x> <y> <DIRECTION>  land the rover (DIRECTION: NORTH, EAST, SOUTH, WEST)',
  'status                    print the rover state',
  'help                      show this help',
  'exit | quit               leave the console',
  '<commands>                execute a command string, e.g. FFRFF',
].join('\n');

// Line-oriented console over a single rover, used by the interactive CLI
export class ControlSession {
  constructor(private rover: IRover) {}

  handle(line: string): SessionReply {
    const input = line.trim();
    const keyword = input.split(/\s+/)[0].toLowerCase();

    switch (keyword) {
      case '':
        return this.reply('');
      case 'exit':
      case 'quit':
        return { output: 'Exiting...', exit: true };
      case 'help':
        return this.reply(`${SESSION_HELP}\nCommands: ${this.rover.getCommandNames().join(' ')}`);
      case 'status':
        return this.reply(this.rover.toString());
      case 'land':
        return this.land(input.split(/\s+/).slice(1));
      default:
        return this.execute(input);
    }
  }

  private land(args: string[]): SessionReply {
    if (args.length !== 3) {
      return this.reply('Usage: land <x> <y> <DIRECTION>');
    }

    const x = Coordinates.parseComponent(args[0]);
    const y = Coordinates.parseComponent(args[1]);
    const direction = Compass.parse(args[2]);
    if (x === null || y === null) {
      return this.reply(`Coordinates must be integers, got '${args[0]}' '${args[1]}'`);
    }
    if (!direction) {
      return this.reply(`Unknown direction '${args[2]}'`);
    }

    this.rover.land(x, y, direction);
    return this.reply(this.rover.toString());
  }

  private execute(commands: string): SessionReply {
    try {
      this.rover.execute(commands);
      return this.reply(this.rover.toString());
    } catch (error) {
      if (ErrorHandler.isLandingError(error)) {
        return this.reply(`${ErrorHandler.formatError(error)}. Use: land <x> <y> <DIRECTION>`);
      }
      throw error;
    }
  }

  private reply(output: string): SessionReply {
    return { output, exit: false };
  }
}
