import { EncodeError } from '../utils/error-handler';
import { CommandKind, LaserCommand } from './types';

const ALIASES = new Map<string, CommandKind>([
  ['move', 'move'],
  ['jump', 'move'],
  ['cut', 'cut'],
  ['mark', 'cut'],
  ['goto', 'goto'],
  ['delay', 'delay'],
  ['jumpspeed', 'setJumpSpeed'],
  ['markspeed', 'setMarkSpeed'],
  ['power', 'setPower'],
  ['port', 'writePort'],
  ['end', 'listEnd'],
  ['on', 'laserOn'],
  ['off', 'laserOff'],
  ['execute', 'executeList'],
  ['stop', 'stop'],
  ['home', 'home'],
  ['version', 'getVersion'],
  ['liststatus', 'getListStatus'],
  ['position', 'getPosition'],
]);

function numberArg(args: string[], index: number, name: string): number {
  const raw = args[index];
  if (raw === undefined) {
    throw new EncodeError(`Missing ${name}`);
  }
  const value = raw.startsWith('0x') ? Number.parseInt(raw.slice(2), 16) : Number(raw);
  if (!Number.isFinite(value)) {
    throw new EncodeError(`${name} is not a number: ${raw}`);
  }
  return value;
}

/**
 * Parses a one-line command such as `cut 100 200` or `power 42.5`.
 * Range checks are left to the codec.
 */
export function parseCommandLine(line: string): LaserCommand {
  const [word = '', ...args] = line.trim().split(/\s+/);
  const kind = ALIASES.get(word.toLowerCase());
  if (!kind) {
    throw new EncodeError(`Unknown command: ${word}`);
  }

  switch (kind) {
    case 'move':
    case 'cut':
    case 'goto':
      return { kind, x: numberArg(args, 0, 'x'), y: numberArg(args, 1, 'y') };
    case 'delay':
      return { kind, micros: numberArg(args, 0, 'micros') };
    case 'setJumpSpeed':
    case 'setMarkSpeed':
      return { kind, speed: numberArg(args, 0, 'speed') };
    case 'setPower':
      return { kind, percent: numberArg(args, 0, 'percent') };
    case 'writePort':
      return { kind, bits: numberArg(args, 0, 'bits') };
    default:
      return { kind };
  }
}
