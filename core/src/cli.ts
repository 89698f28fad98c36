#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import readlineSync from 'readline-sync';
import { Direction, RoverConfig } from './types';
import { loadRoverConfig } from './config/RoverConfig';
import { ControlSession } from './console/ControlSession';
import { LandingOverrides, resolveConfigPath, runCommandString } from './console/CommandRunner';
import { moveBackward, moveForward, rotateLeft, rotateRight, compose } from './actions';
import { Rover } from './rover/Rover';
import { RoverBuilder } from './rover/RoverBuilder';
import { ISensor } from './interfaces/Sensor';
import { ErrorHandler } from './utils/error-handler';
import { Logger } from './utils/logger';

const program = new Command();
const logger = new Logger('CLI');

program
  .name('rover')
  .description('Program a rover and drive it with command strings')
  .version('0.1.0');

function readConfig(configPath: string | undefined): RoverConfig {
  return loadRoverConfig(resolveConfigPath(configPath));
}

function fail(err: unknown): void {
  const message = err instanceof Error ? ErrorHandler.formatError(err) : String(err);
  logger.error(message);
  process.exitCode = 1;
}

program
  .command('run')
  .description('Land the rover and execute a command string')
  .argument('<commands>', 'Command string (e.g., "FFRFF")')
  .option('-c, --config <path>', 'Rover configuration file')
  .option('--x <x>', 'Landing X coordinate')
  .option('--y <y>', 'Landing Y coordinate')
  .option('-d, --direction <direction>', 'Landing direction (NORTH, EAST, SOUTH, WEST)')
  .action((commands: string, options: { config?: string } & LandingOverrides) => {
    try {
      const config = readConfig(options.config);
      const result = runCommandString(config, commands, options);

      logger.info(`Landed: ${result.landing}`);
      if (result.stopped) {
        const { command, index, reason } = result.report;
        logger.warn(result.output, `(stopped on '${command}' at index ${index}: ${reason})`);
      } else {
        logger.success(result.output);
      }
      process.exitCode = result.exitCode;
    } catch (err) {
      fail(err);
    }
  });

class AlwaysSafe implements ISensor {
  isSafe(): boolean {
    return true;
  }
}

class NeverSafe implements ISensor {
  isSafe(): boolean {
    return false;
  }
}

program
  .command('demo')
  .description('Replay the reference scenario step by step')
  .action(() => {
    const rover = new RoverBuilder()
      .programCommand('F', moveForward())
      .programCommand('B', moveBackward())
      .programCommand('R', rotateRight())
      .programCommand('L', rotateLeft())
      .programCommand('U', compose([rotateRight(), rotateRight()]))
      .addSensor(new AlwaysSafe())
      .addSensor(new AlwaysSafe())
      .build();

    console.log(chalk.gray('Before landing:'), rover.toString());
    try {
      rover.execute('F');
    } catch (err) {
      console.log(chalk.gray('execute("F"):'), chalk.red(err instanceof Error ? err.message : String(err)));
    }

    rover.land(0, 0, Direction.East);
    console.log(chalk.gray('land(0, 0, EAST):'), rover.toString());

    for (const commands of ['FFBRLU', 'FXFFF', 'FFF']) {
      rover.execute(commands);
      console.log(chalk.gray(`execute("${commands}"):`), rover.toString());
    }

    const brokenRover = new RoverBuilder()
      .programCommand('X', moveForward())
      .addSensor(new NeverSafe())
      .build();
    brokenRover.land(-1, -1, Direction.West);
    brokenRover.execute('X');
    console.log(chalk.gray('broken rover execute("X"):'), brokenRover.toString());
  });

program
  .command('interactive')
  .description('Enter interactive mode')
  .option('-c, --config <path>', 'Rover configuration file')
  .action((options: { config?: string }) => {
    let rover: Rover;
    try {
      const config = readConfig(options.config);
      rover = RoverBuilder.fromConfig(config).build();
      if (config.landing) {
        rover.land(config.landing.x, config.landing.y, config.landing.direction);
      }
    } catch (err) {
      fail(err);
      return;
    }

    const session = new ControlSession(rover);
    console.log(chalk.yellow('Interactive mode. Type "help" for commands or "exit" to quit.'));
    console.log(chalk.blue(rover.toString()));

    for (;;) {
      const input = readlineSync.question(chalk.cyan('rover> '));
      const reply = session.handle(input);
      if (reply.output) {
        console.log(reply.exit ? chalk.yellow(reply.output) : chalk.blue(reply.output));
      }
      if (reply.exit) {
        break;
      }
    }
  });

if (process.argv.length <= 2) {
  program.help();
}

program.parse();
