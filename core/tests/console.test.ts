import { ControlSession, SESSION_HELP } from '../src/console/ControlSession';
import { createStandardBuilder } from './helpers/rover-builders';

describe('ControlSession', () => {
  let session: ControlSession;

  beforeEach(() => {
    session = new ControlSession(createStandardBuilder().build());
  });

  test('should report an unlanded rover', () => {
    expect(session.handle('status')).toEqual({ output: 'unknown', exit: false });
    expect(session.handle('FF')).toEqual({
      output: '[ROVER_DID_NOT_LAND] Rover did not land. Use: land <x> <y> <DIRECTION>',
      exit: false,
    });
  });

  test('should land and drive the rover', () => {
    expect(session.handle('land 0 0 east').output).toBe('(0, 0) EAST');
    expect(session.handle('FFRF').output).toBe('(2, -1) SOUTH');
    expect(session.handle('  FX ').output).toBe('(2, -2) SOUTH stopped');
    expect(session.handle('STATUS').output).toBe('(2, -2) SOUTH stopped');
  });

  test('should validate land arguments', () => {
    expect(session.handle('land 1').output).toBe('Usage: land <x> <y> <DIRECTION>');
    expect(session.handle('land 0 x east').output).toBe("Coordinates must be integers, got '0' 'x'");
    expect(session.handle('land 1.5 2 north').output).toBe("Coordinates must be integers, got '1.5' '2'");
    expect(session.handle('land 1 2 up').output).toBe("Unknown direction 'up'");
    expect(session.handle('status').output).toBe('unknown');
  });

  test('should list help and programmed commands', () => {
    expect(session.handle('help').output).toBe(`${SESSION_HELP}\nCommands: F B R L U`);
  });

  test('should ignore blank lines and exit on request', () => {
    expect(session.handle('   ')).toEqual({ output: '', exit: false });
    expect(session.handle('exit')).toEqual({ output: 'Exiting...', exit: true });
    expect(session.handle('quit').exit).toBe(true);
  });
});
