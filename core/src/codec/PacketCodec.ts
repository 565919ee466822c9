import { DecodeError, EncodeError } from '../utils/error-handler';
import {
  FRAME_PARAMS,
  FRAME_SIZE,
  KIND_BY_OPCODE,
  LIST_OPCODE_BASE,
  MAX_STATUS_PAYLOAD,
  MNEMONICS,
  OPCODES,
  STATUS_BUSY,
  STATUS_READY,
  isCommandKind,
} from './opcodes';
import { DecodeResult, LaserCommand, Packet, StatusRecord } from './types';

const U16_MAX = 0xffff;
const POWER_SCALE = 0xfff;
const DELAY_TICK_US = 10;

/**
 * Encodes laser commands into 12-byte command frames and decodes the
 * variable-size status frames the controller sends back.
 *
 * Command frames are symmetric: `decodeCommand(encode(c).bytes)` yields `c`
 * for every representable command. Status frames only travel from the device
 * to the host, so there is no encoder for them here apart from
 * {@link encodeStatusFrame}, which exists for device simulation.
 */
export class PacketCodec {
  private nextSequence = 1;

  encode(command: LaserCommand): Packet {
    if (!isCommandKind(command.kind)) {
      throw new EncodeError(`Unknown command kind: ${String(command.kind)}`);
    }
    const opcode = OPCODES[command.kind];
    const params = this.paramsFor(command);

    const bytes = Buffer.alloc(FRAME_SIZE);
    bytes.writeUInt16LE(opcode, 0);
    params.forEach((value, index) => bytes.writeUInt16LE(value, 2 + index * 2));

    return Object.freeze({
      bytes,
      kind: command.kind,
      sequence: this.nextSequence++,
      text: describeCommand(command),
      expectsReply: opcode < LIST_OPCODE_BASE,
    });
  }

  decodeCommand(frame: Uint8Array): LaserCommand {
    if (frame.length !== FRAME_SIZE) {
      throw new DecodeError(`Command frame must be ${FRAME_SIZE} bytes, got ${frame.length}`, {
        length: frame.length,
      });
    }
    const buf = Buffer.from(frame.buffer, frame.byteOffset, frame.byteLength);
    const opcode = buf.readUInt16LE(0);
    const kind = KIND_BY_OPCODE.get(opcode);
    if (!kind) {
      throw new DecodeError(`Unknown opcode 0x${opcode.toString(16).padStart(4, '0')}`, { opcode });
    }
    const p: number[] = [];
    for (let i = 0; i < FRAME_PARAMS; i++) {
      p.push(buf.readUInt16LE(2 + i * 2));
    }

    switch (kind) {
      case 'move':
      case 'cut':
      case 'goto':
        return { kind, x: p[0], y: p[1] };
      case 'delay':
        return { kind, micros: p[0] * DELAY_TICK_US };
      case 'setJumpSpeed':
      case 'setMarkSpeed':
        return { kind, speed: p[0] };
      case 'setPower':
        return { kind, percent: Math.round((p[0] * 1000) / POWER_SCALE) / 10 };
      case 'writePort':
        return { kind, bits: p[0] };
      default:
        return { kind };
    }
  }

  /**
   * Decodes one status frame from the start of `raw`. Never throws: a short
   * buffer yields `incomplete`, a bad length byte yields `error` consuming one
   * byte so a stream reader can resynchronise.
   */
  decode(raw: Uint8Array): DecodeResult {
    if (raw.length === 0) {
      return { type: 'incomplete', needed: 1 };
    }
    const length = raw[0];
    if (length === 0 || length % 2 !== 0 || length > MAX_STATUS_PAYLOAD) {
      return {
        type: 'error',
        error: new DecodeError(`Invalid status frame length ${length}`, { length }),
        consumed: 1,
      };
    }
    const total = 1 + length;
    if (raw.length < total) {
      return { type: 'incomplete', needed: total - raw.length };
    }

    const buf = Buffer.from(raw.buffer, raw.byteOffset, total);
    const words: number[] = [];
    for (let offset = 1; offset < total; offset += 2) {
      words.push(buf.readUInt16LE(offset));
    }
    return { type: 'status', record: toStatusRecord(words), consumed: total };
  }

  private paramsFor(command: LaserCommand): number[] {
    switch (command.kind) {
      case 'move':
      case 'cut':
      case 'goto':
        return [toWord(command.x, 'x'), toWord(command.y, 'y')];
      case 'delay':
        return [delayTicks(command.micros)];
      case 'setJumpSpeed':
      case 'setMarkSpeed':
        return [toWord(command.speed, 'speed')];
      case 'setPower':
        return [powerValue(command.percent)];
      case 'writePort':
        return [toWord(command.bits, 'bits')];
      case 'listEnd':
      case 'laserOn':
      case 'laserOff':
      case 'executeList':
      case 'stop':
      case 'home':
      case 'getVersion':
      case 'getListStatus':
      case 'getPosition':
        return [];
      default: {
        const unreachable: never = command;
        return unreachable;
      }
    }
  }
}

/**
 * Accumulates raw chunks from a transport and yields every complete status
 * frame. An incomplete tail is kept for the next chunk.
 */
export class StatusStream {
  private pending: Buffer = Buffer.alloc(0);

  constructor(private readonly codec: PacketCodec) {}

  push(chunk: Uint8Array): Array<StatusRecord | DecodeError> {
    this.pending = Buffer.concat([this.pending, chunk]);
    const results: Array<StatusRecord | DecodeError> = [];

    while (this.pending.length > 0) {
      const result = this.codec.decode(this.pending);
      if (result.type === 'incomplete') break;
      results.push(result.type === 'status' ? result.record : result.error);
      this.pending = this.pending.subarray(result.consumed);
    }
    return results;
  }

  get pendingBytes(): number {
    return this.pending.length;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}

export function encodeStatusFrame(words: readonly number[]): Buffer {
  if (words.length === 0 || words.length * 2 > MAX_STATUS_PAYLOAD) {
    throw new EncodeError(`A status frame carries 1 to ${MAX_STATUS_PAYLOAD / 2} words`);
  }
  const frame = Buffer.alloc(1 + words.length * 2);
  frame.writeUInt8(words.length * 2, 0);
  words.forEach((word, index) => frame.writeUInt16LE(toWord(word, 'status word'), 1 + index * 2));
  return frame;
}

export function describeCommand(command: LaserCommand): string {
  const mnemonic = MNEMONICS[command.kind];
  const fields = Object.entries(command)
    .filter(([key]) => key !== 'kind')
    .map(([key, value]) => `${key}=${String(value)}`);
  return fields.length ? `${mnemonic} ${fields.join(' ')}` : mnemonic;
}

function toStatusRecord(words: number[]): StatusRecord {
  const flags = words[words.length - 1];
  const busy = (flags & STATUS_BUSY) !== 0;
  const ready = (flags & STATUS_READY) !== 0;
  const state = busy ? 'Busy' : ready ? 'Ready' : 'Not ready';
  const hex = words.map((w) => w.toString(16).padStart(4, '0')).join(' ');
  return Object.freeze({ words: Object.freeze(words), flags, busy, ready, text: `${state} [${hex}]` });
}

function toWord(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0 || value > U16_MAX) {
    throw new EncodeError(`${field}=${value} is outside 0..${U16_MAX}`, { field, value });
  }
  return value;
}

function delayTicks(micros: number): number {
  if (!Number.isInteger(micros) || micros < 0 || micros % DELAY_TICK_US !== 0) {
    throw new EncodeError(`delay must be a non-negative multiple of ${DELAY_TICK_US}µs, got ${micros}`, {
      micros,
    });
  }
  return toWord(micros / DELAY_TICK_US, 'delay');
}

function powerValue(percent: number): number {
  if (!Number.isFinite(percent) || percent < 0 || percent > 100) {
    throw new EncodeError(`power ${percent}% is outside 0..100`, { percent });
  }
  const tenths = percent * 10;
  if (Math.abs(tenths - Math.round(tenths)) > 1e-9) {
    throw new EncodeError(`power resolution is 0.1%, got ${percent}`, { percent });
  }
  return Math.round((percent * POWER_SCALE) / 100);
}
