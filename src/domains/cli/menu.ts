import type { Interface as ReadlineInterface } from 'readline/promises';
import { GripperError } from '../device/errors';
import type { GripperController } from '../gripper/gripper';
import type { Logger } from '../observability/types';

export type MenuCommand =
  | { kind: 'move'; value: number }
  | { kind: 'status' }
  | { kind: 'position' }
  | { kind: 'calibrate' }
  | { kind: 'test'; steps?: number }
  | { kind: 'load'; loaded: boolean }
  | { kind: 'angle'; angle: number; timeMs?: number }
  | { kind: 'help' }
  | { kind: 'health' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'invalid'; reason: string };

export interface MenuIO {
  /** Resolves null once input has ended (EOF, Ctrl-C). */
  question(prompt: string): Promise<string | null>;
  print(line: string): void;
}

export const MENU_USAGE = [
  'Commands:',
  '  <0.0-1.0>            move the gripper (0 = open, 1 = closed)',
  '  status               servo angle, temperature and voltage',
  '  position             current position',
  '  calibrate            drive fully open, then fully closed',
  '  test [steps]         step from open to closed',
  '  load on|off          power the servo or let it go limp',
  '  angle <deg> [ms]     raw servo move in degrees',
  '  help                 list the firmware commands',
  '  health               link state',
  '  quit | exit | q      leave',
];

const QUIT_WORDS = new Set(['quit', 'exit', 'q']);

function toNumber(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export function parseMenuInput(input: string): MenuCommand {
  const [word = '', ...args] = input.trim().split(/\s+/);
  const keyword = word.toLowerCase();

  if (keyword === '') return { kind: 'empty' };
  if (QUIT_WORDS.has(keyword)) return { kind: 'quit' };

  switch (keyword) {
    case 'status':
    case 'position':
    case 'calibrate':
    case 'help':
    case 'health':
      return { kind: keyword };
    case 'test': {
      if (args.length === 0) return { kind: 'test' };
      const steps = toNumber(args[0]);
      if (steps === null || !Number.isInteger(steps)) {
        return { kind: 'invalid', reason: `Step count must be an integer, got '${args[0] ?? ''}'` };
      }
      return { kind: 'test', steps };
    }
    case 'load': {
      const state = args[0]?.toLowerCase();
      if (state === 'on' || state === '1') return { kind: 'load', loaded: true };
      if (state === 'off' || state === '0') return { kind: 'load', loaded: false };
      return { kind: 'invalid', reason: 'Usage: load on|off' };
    }
    case 'angle': {
      const angle = toNumber(args[0]);
      if (angle === null) return { kind: 'invalid', reason: 'Usage: angle <deg> [ms]' };
      if (args.length < 2) return { kind: 'angle', angle };
      const timeMs = toNumber(args[1]);
      if (timeMs === null) return { kind: 'invalid', reason: 'Usage: angle <deg> [ms]' };
      return { kind: 'angle', angle, timeMs };
    }
  }

  const value = toNumber(word);
  if (value === null) return { kind: 'invalid', reason: `Unknown command '${word}'` };
  return { kind: 'move', value };
}

const formatValue = (value: number | null, digits = 3) => (value === null ? 'no reply' : value.toFixed(digits));

/** Run one command and return what to show. `quit` and `empty` produce nothing. */
export async function executeMenuCommand(
  gripper: GripperController,
  command: MenuCommand,
  defaultMoveTimeMs: number,
): Promise<string[]> {
  switch (command.kind) {
    case 'empty':
    case 'quit':
      return [];
    case 'invalid':
      return [command.reason];
    case 'move': {
      const reached = await gripper.moveTo(command.value);
      return [reached === null ? 'Move failed: no result from the gripper' : `Reached ${reached.toFixed(3)}`];
    }
    case 'status': {
      const status = await gripper.getStatus();
      if (!status) return ['Status: no reply'];
      return [`Angle ${status.angle.toFixed(2)}°, temperature ${status.temperature}°C, voltage ${status.voltage.toFixed(2)}V`];
    }
    case 'position': {
      const position = await gripper.readNormalizedPosition();
      if (!position) return ['Position: no reply'];
      return [`Angle ${position.angle.toFixed(2)}°, normalized ${position.normalized.toFixed(3)}`];
    }
    case 'calibrate': {
      const { open, closed } = await gripper.calibrate();
      return [`Calibration: open ${formatValue(open)}, closed ${formatValue(closed)}`];
    }
    case 'test': {
      const steps = await gripper.runTestSequence(command.steps);
      return steps.map(
        (step, i) => `Step ${i + 1}: target ${step.target.toFixed(3)}, actual ${formatValue(step.actual)}, error ${formatValue(step.error)}`,
      );
    }
    case 'load': {
      const ack = await gripper.setLoad(command.loaded);
      return [ack === null ? 'Load: no reply' : ack ? `Servo ${command.loaded ? 'loaded' : 'unloaded'}` : 'Load: rejected'];
    }
    case 'angle': {
      const ack = await gripper.moveToAngle(command.angle, command.timeMs ?? defaultMoveTimeMs);
      return [ack === null ? 'Angle move: no reply' : ack ? `Moving to ${command.angle.toFixed(1)}°` : 'Angle move: rejected'];
    }
    case 'help': {
      const lines = await gripper.help();
      return lines.length > 0 ? lines : ['Help: no reply'];
    }
    case 'health':
      return [gripper.isHealthy() ? 'Link is healthy' : 'Link is down; restart to reconnect'];
  }
}

/**
 * Read commands until quit or end of input. Validation and link errors are
 * shown and the loop continues; anything else propagates.
 */
export async function runMenu(
  gripper: GripperController,
  io: MenuIO,
  options: { defaultMoveTimeMs: number; logger: Logger },
): Promise<void> {
  MENU_USAGE.forEach(line => io.print(line));

  for (;;) {
    const input = await io.question('gripper> ');
    if (input === null) return;

    const command = parseMenuInput(input);
    if (command.kind === 'quit') return;

    try {
      const lines = await executeMenuCommand(gripper, command, options.defaultMoveTimeMs);
      lines.forEach(line => io.print(line));
    } catch (e) {
      if (!(e instanceof GripperError)) throw e;
      options.logger.debug('Menu command failed', { command: command.kind, code: e.code });
      io.print(`${e.name}: ${e.message}`);
    }
  }
}

/** Adapt a readline interface; input ending resolves the pending question with null. */
export function createReadlineIO(rl: ReadlineInterface, output: NodeJS.WritableStream = process.stdout): MenuIO {
  let closed = false;
  const ended = new Promise<null>(resolve => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    question: (prompt) => {
      if (closed) return Promise.resolve(null);
      const answer = rl.question(prompt).catch((e: unknown) => {
        // a pending question is aborted when the input closes
        if (closed) return null;
        throw e;
      });
      return Promise.race([answer, ended]);
    },
    print: (line) => {
      output.write(`${line}\n`);
    },
  };
}
