import type { MockScenarioStep } from './mock-serial';

export interface MockGripperOptions {
  angleMin: number;
  angleMax: number;
  /** Fraction of the commanded move time the simulated move takes */
  timeScale?: number;
  temperature?: number;
  voltage?: number;
}

const HELP_LINES = [
  'Available commands:',
  '  - help: 显示所有可用命令。',
  '  - servo_status <id>: 读取舵机状态。',
  '  - servo_read_now_position <id>: 读取实时位置。',
  '  - gripper_control <id> <0.0~1.0> <time_ms>: 控制夹爪。',
  '  - servo_load <id> <0|1>: 卸载/上电。',
  '  - servo_position <id> <angle> <time_ms>: 移动到角度。',
];

function tokens(command: string): string[] {
  return command.trim().split(/\s+/);
}

/**
 * Scenario that behaves like the gripper firmware: it keeps the servo angle
 * between commands and answers with the same line shapes the board prints.
 */
export function createMockGripperScenario(options: MockGripperOptions): MockScenarioStep[] {
  const timeScale = options.timeScale ?? 0.1;
  const temperature = options.temperature ?? 35;
  const voltage = options.voltage ?? 6.12;
  let angle = options.angleMin;
  let loaded = true;

  const span = options.angleMax - options.angleMin;

  return [
    { match: /^help\b/, reply: HELP_LINES },
    {
      match: /^servo_status\b/,
      reply: (command) => {
        const id = tokens(command)[1] ?? '1';
        return [`Servo ${id} 状态: 角度=${angle.toFixed(2)}°, 温度=${temperature}°C, 电压=${voltage.toFixed(2)}V`];
      },
      delay: 20,
    },
    {
      match: /^servo_read_now_position\b/,
      reply: (command) => {
        const id = tokens(command)[1] ?? '1';
        return [`Servo ${id} 实时位置: 角度=${angle.toFixed(2)}°`];
      },
      delay: 20,
    },
    {
      match: /^gripper_control\b/,
      reply: (command) => {
        const [, id, rawValue] = tokens(command);
        const value = Number(rawValue);
        if (!Number.isFinite(value) || value < 0 || value > 1) {
          return [`ERROR: invalid gripper target '${rawValue ?? ''}'`];
        }
        if (!loaded) {
          return [`ERROR: servo ${id ?? '1'} is unloaded`];
        }
        angle = options.angleMin + value * span;
        return [`I (0) GRIPPER: servo ${id ?? '1'} reached ${angle.toFixed(2)}°`, `GRIPPER_RESULT:${value.toFixed(3)}`];
      },
      delay: (command) => Math.round((Number(tokens(command)[3]) || 0) * timeScale),
    },
    {
      match: /^servo_load\b/,
      reply: (command) => {
        const [, id, state] = tokens(command);
        if (state !== '0' && state !== '1') {
          return [`E (0) SERVO_CMD: Invalid load state: ${state ?? ''} (use 0 for unload, 1 for load)`];
        }
        loaded = state === '1';
        return [`I (0) SERVO_CMD: Successfully set servo ${id ?? '1'} to ${loaded ? 'LOAD' : 'UNLOAD'} state`];
      },
    },
    {
      match: /^servo_position\b/,
      reply: (command) => {
        const [, id, rawAngle, rawTime] = tokens(command);
        const target = Number(rawAngle);
        if (!Number.isFinite(target) || target < 0 || target > 240) {
          return [`E (0) SERVO_CMD: Invalid angle: ${rawAngle ?? ''} (valid range: 0-240)`];
        }
        angle = target;
        return [`I (0) SERVO_CMD: Successfully commanded servo ${id ?? '1'} to move to ${target.toFixed(1)}° in ${rawTime ?? '0'} ms`];
      },
    },
    {
      match: /\S/,
      reply: (command) => [`Error: Unknown command '${tokens(command)[0] ?? ''}'. Type 'help' for a list.`],
    },
  ];
}
