import { CommandKind } from './types';

export const FRAME_SIZE = 12;
export const FRAME_PARAMS = 5;

/** Opcodes at or above this value are buffered list commands; below are immediate. */
export const LIST_OPCODE_BASE = 0x8000;

export const MAX_STATUS_PAYLOAD = 16;

export const STATUS_BUSY = 0x04;
export const STATUS_READY = 0x20;

export const OPCODES: Record<CommandKind, number> = {
  move: 0x8001,
  listEnd: 0x8002,
  delay: 0x8004,
  cut: 0x8005,
  setJumpSpeed: 0x8006,
  setMarkSpeed: 0x800c,
  writePort: 0x8011,
  setPower: 0x8012,
  laserOff: 0x0002,
  laserOn: 0x0004,
  executeList: 0x0005,
  getVersion: 0x0007,
  getListStatus: 0x000a,
  getPosition: 0x000c,
  goto: 0x000d,
  stop: 0x001f,
  home: 0x0028,
};

export const MNEMONICS: Record<CommandKind, string> = {
  move: 'listJumpTo',
  listEnd: 'listEndOfList',
  delay: 'listDelayTime',
  cut: 'listMarkTo',
  setJumpSpeed: 'listJumpSpeed',
  setMarkSpeed: 'listMarkSpeed',
  writePort: 'listWritePort',
  setPower: 'listMarkCurrent',
  laserOff: 'DisableLaser',
  laserOn: 'EnableLaser',
  executeList: 'ExecuteList',
  getVersion: 'GetVersion',
  getListStatus: 'GetListStatus',
  getPosition: 'GetPositionXY',
  goto: 'GotoXY',
  stop: 'StopExecute',
  home: 'AxisGoOrigin',
};

export function isCommandKind(value: string): value is CommandKind {
  return Object.prototype.hasOwnProperty.call(OPCODES, value);
}

export const KIND_BY_OPCODE: ReadonlyMap<number, CommandKind> = new Map(
  Object.keys(OPCODES)
    .filter(isCommandKind)
    .map((kind) => [OPCODES[kind], kind] as const)
);
