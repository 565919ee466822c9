import { encodeStatusFrame, PacketCodec } from '../codec/PacketCodec';
import { LIST_OPCODE_BASE, OPCODES, STATUS_READY } from '../codec/opcodes';
import { LaserCommand } from '../codec/types';
import { OpenFailureReason, TransportKind } from '../types';
import { TransportOpenError } from '../utils/error-handler';
import { BaseLink, LinkTimeouts } from './BaseLink';

export const MOCK_FIRMWARE_VERSION = 0x0107;

const DEFAULT_TIMEOUTS: LinkTimeouts = {
  connectTimeoutMs: 1000,
  sendTimeoutMs: 1000,
  receiveTimeoutMs: 1000,
};

/**
 * In-process controller simulation. Immediate commands are answered with a
 * status frame; list commands are only recorded. Failures can be scripted.
 */
export class MockLink extends BaseLink {
  readonly kind = TransportKind.Mock;
  readonly description = 'mock device';

  /** Every frame written while open, in order. */
  readonly sent: Buffer[] = [];
  openCount = 0;
  closeCount = 0;
  statusFlags = STATUS_READY;

  private readonly codec = new PacketCodec();
  private position = { x: 0x8000, y: 0x8000 };
  private openFailures: Array<OpenFailureReason> = [];
  private sendFailures = 0;
  private failEverySend = false;
  private sendDelayMs = 0;
  private closeDelayMs = 0;
  private silent = false;

  constructor(timeouts: Partial<LinkTimeouts> = {}) {
    super({ ...DEFAULT_TIMEOUTS, ...timeouts }, 'MockLink');
  }

  /** The next `count` opens fail with `reason`. */
  failOpens(reason: OpenFailureReason, count = 1): void {
    for (let i = 0; i < count; i++) this.openFailures.push(reason);
  }

  failNextSends(count: number): void {
    this.sendFailures = count;
  }

  failAllSends(enabled: boolean): void {
    this.failEverySend = enabled;
  }

  setSendDelay(ms: number): void {
    this.sendDelayMs = ms;
  }

  setCloseDelay(ms: number): void {
    this.closeDelayMs = ms;
  }

  /** Stop answering immediate commands. */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  /** Simulates the device vanishing mid-session. */
  drop(reason = 'Device unplugged'): void {
    this.handleLost(new Error(reason));
  }

  sentCommands(): LaserCommand[] {
    return this.sent.map((frame) => this.codec.decodeCommand(frame));
  }

  protected async openHandle(): Promise<void> {
    const reason = this.openFailures.shift();
    if (reason) {
      throw new TransportOpenError(reason, `Simulated open failure: ${reason}`);
    }
    this.openCount++;
  }

  protected async closeHandle(): Promise<void> {
    if (this.closeDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.closeDelayMs));
    }
    this.closeCount++;
  }

  protected async write(bytes: Buffer): Promise<void> {
    if (this.sendDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.sendDelayMs));
    }
    if (this.failEverySend || this.sendFailures > 0) {
      if (this.sendFailures > 0) this.sendFailures--;
      throw new Error('Simulated write failure');
    }
    this.sent.push(Buffer.from(bytes));

    const opcode = bytes.readUInt16LE(0);
    if (opcode < LIST_OPCODE_BASE && !this.silent) {
      this.pushInbound(this.replyTo(bytes));
    }
  }

  private replyTo(frame: Buffer): Buffer {
    const command = this.codec.decodeCommand(frame);
    switch (command.kind) {
      case 'getVersion':
        return encodeStatusFrame([MOCK_FIRMWARE_VERSION, this.statusFlags]);
      case 'goto':
        this.position = { x: command.x, y: command.y };
        return encodeStatusFrame([OPCODES.goto, this.statusFlags]);
      case 'home':
        this.position = { x: 0x8000, y: 0x8000 };
        return encodeStatusFrame([OPCODES.home, this.statusFlags]);
      case 'getPosition':
        return encodeStatusFrame([this.position.x, this.position.y, this.statusFlags]);
      default:
        return encodeStatusFrame([OPCODES[command.kind], this.statusFlags]);
    }
  }
}
