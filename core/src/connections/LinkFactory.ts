import { ITransportLink } from '../interfaces/TransportLink';
import { ControllerConfig, TransportKind } from '../types';
import { LocalLink } from './LocalLink';
import { MockLink } from './MockLink';
import { NetworkLink } from './NetworkLink';

export class LinkFactory {
  static create(config: ControllerConfig): ITransportLink {
    const timeouts = {
      connectTimeoutMs: config.connectTimeoutMs,
      sendTimeoutMs: config.sendTimeoutMs,
      receiveTimeoutMs: config.receiveTimeoutMs,
    };

    switch (config.transportKind) {
      case TransportKind.Local:
        return new LocalLink({ ...timeouts, path: config.address, baudRate: config.baudRate });
      case TransportKind.Network:
        return new NetworkLink({ ...timeouts, host: config.address, port: config.port });
      case TransportKind.Mock:
        return new MockLink(timeouts);
      default: {
        const unsupported: never = config.transportKind;
        throw new Error(`Unsupported transport: ${String(unsupported)}`);
      }
    }
  }
}
