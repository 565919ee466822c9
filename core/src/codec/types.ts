import { DecodeError } from '../utils/error-handler';

// Logical laser commands
export type LaserCommand =
  | { kind: 'move'; x: number; y: number }
  | { kind: 'cut'; x: number; y: number }
  | { kind: 'goto'; x: number; y: number }
  | { kind: 'delay'; micros: number }
  | { kind: 'setJumpSpeed'; speed: number }
  | { kind: 'setMarkSpeed'; speed: number }
  | { kind: 'setPower'; percent: number }
  | { kind: 'writePort'; bits: number }
  | { kind: 'listEnd' }
  | { kind: 'laserOn' }
  | { kind: 'laserOff' }
  | { kind: 'executeList' }
  | { kind: 'stop' }
  | { kind: 'home' }
  | { kind: 'getVersion' }
  | { kind: 'getListStatus' }
  | { kind: 'getPosition' };

export type CommandKind = LaserCommand['kind'];

export interface Packet {
  readonly bytes: Buffer;
  readonly kind: CommandKind;
  readonly sequence: number;
  /** Mnemonic form, e.g. `listMarkTo x=100 y=200`. */
  readonly text: string;
  /** Immediate commands are answered by exactly one status frame. */
  readonly expectsReply: boolean;
}

export interface StatusRecord {
  readonly words: readonly number[];
  readonly flags: number;
  readonly busy: boolean;
  readonly ready: boolean;
  readonly text: string;
}

export type DecodeResult =
  | { type: 'status'; record: StatusRecord; consumed: number }
  | { type: 'incomplete'; needed: number }
  | { type: 'error'; error: DecodeError; consumed: number };
