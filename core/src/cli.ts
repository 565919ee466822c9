#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import * as readlineSync from 'readline-sync';
import { PacketCodec } from './codec/PacketCodec';
import { parseCommandLine } from './codec/parseCommand';
import { ConfigOverrides, loadConfigFromEnv } from './config/config';
import { LocalLink } from './connections/LocalLink';
import { LaserController } from './controller/LaserController';
import { ConnectionState, TransportKind } from './types';
import { ErrorHandler } from './utils/error-handler';

interface ConnectOptions {
  transport?: string;
  address?: string;
  port?: string;
  baud?: string;
  handshake: boolean;
}

const program = new Command();

program
  .name('laserlink')
  .description('Talk to a galvo laser controller over serial or TCP')
  .version('0.1.0');

program
  .command('devices')
  .description('List serial devices')
  .action(async () => {
    try {
      const devices = await LocalLink.listDevices();
      if (devices.length === 0) {
        console.log(chalk.yellow('No serial devices found.'));
        return;
      }
      for (const device of devices) {
        const vendor = [device.manufacturer, device.vendorId && `${device.vendorId}:${device.productId ?? ''}`]
          .filter(Boolean)
          .join(' ');
        console.log(`${chalk.green(device.path)} ${chalk.gray(vendor)}`);
      }
    } catch (err) {
      console.error(chalk.red(`Error: ${ErrorHandler.toError(err).message}`));
      process.exitCode = 1;
    }
  });

program
  .command('encode')
  .description('Print the frame for each command, e.g. "cut 100 200" "power 50"')
  .argument('<commands...>', 'Commands to encode')
  .action((commands: string[]) => {
    const codec = new PacketCodec();
    for (const line of commands) {
      try {
        const packet = codec.encode(parseCommandLine(line));
        console.log(`${chalk.blue(packet.bytes.toString('hex'))}  ${packet.text}`);
      } catch (err) {
        console.error(chalk.red(`${line}: ${ErrorHandler.formatError(ErrorHandler.toError(err))}`));
        process.exitCode = 1;
      }
    }
  });

program
  .command('connect')
  .description('Connect and enter an interactive session')
  .option('-t, --transport <kind>', 'Transport (local, network, mock)')
  .option('-a, --address <address>', 'Serial path or host name')
  .option('-p, --port <port>', 'TCP port')
  .option('-b, --baud <rate>', 'Baud rate')
  .option('--no-handshake', 'Skip the version handshake')
  .action(async (options: ConnectOptions) => {
    let controller: LaserController;
    try {
      controller = new LaserController(overridesFrom(options));
    } catch (err) {
      console.error(chalk.red(`Error: ${ErrorHandler.formatError(ErrorHandler.toError(err))}`));
      process.exitCode = 1;
      return;
    }

    controller.subscribe('connectionState', (event) => {
      const colour = event.state === ConnectionState.Connected ? chalk.green : chalk.yellow;
      console.log(colour(`[${event.state}] ${event.text}`));
    });
    controller.subscribe('error', (error) => console.error(chalk.red(ErrorHandler.formatError(error))));
    controller.subscribe('deviceStatus', (status) => console.log(chalk.gray(`Device: ${status.text}`)));

    try {
      await controller.connect();
    } catch (err) {
      console.error(chalk.red(`Could not connect: ${ErrorHandler.toError(err).message}`));
      await controller.shutdown();
      process.exitCode = 1;
      return;
    }
    await interactive(controller);
  });

function overridesFrom(options: ConnectOptions): ConfigOverrides {
  const base = loadConfigFromEnv();
  const kind = Object.values(TransportKind).find((k) => k === options.transport);
  if (options.transport && !kind) {
    throw new Error(`Unknown transport: ${options.transport}`);
  }
  return {
    ...base,
    transportKind: kind ?? base.transportKind,
    address: options.address ?? base.address,
    port: options.port ? Number.parseInt(options.port, 10) : base.port,
    baudRate: options.baud ? Number.parseInt(options.baud, 10) : base.baudRate,
    handshake: options.handshake && base.handshake,
  };
}

/** Waits until everything queued so far has left the buffer. */
async function settle(controller: LaserController, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    const state = controller.connectionState();
    const draining =
      state === ConnectionState.Connected && !controller.isPaused() && controller.statistics().currentBufferBytes > 0;
    if (!draining && state !== ConnectionState.Retrying) return;
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}

async function interactive(controller: LaserController): Promise<void> {
  console.log(chalk.yellow('Interactive mode. Type a command, "help" or "quit".'));

  for (;;) {
    const input = readlineSync.question(chalk.cyan('laser> ')).trim();
    if (!input) continue;

    switch (input.toLowerCase()) {
      case 'quit':
      case 'exit':
        await controller.shutdown();
        console.log(chalk.yellow('Bye.'));
        return;
      case 'help':
        console.log(
          'move|cut|goto <x> <y>, delay <us>, power <pct>, jumpspeed|markspeed <n>, port <bits>,\n' +
            'on, off, end, execute, home, stop, version, position, liststatus,\n' +
            'prefix a command with ! to send it ahead of the queue,\n' +
            'pause, resume, abort, stats, reset, state, clear, connect, disconnect, quit'
        );
        continue;
      case 'stats':
        console.log(chalk.blue(JSON.stringify(controller.statistics(), null, 2)));
        continue;
      case 'reset':
        controller.resetStatistics();
        console.log(chalk.green('Statistics reset.'));
        continue;
      case 'state':
        console.log(chalk.blue(`${controller.connectionState()} (${controller.queueLength()} queued)`));
        continue;
      case 'clear':
        controller.clearQueue();
        continue;
      case 'pause':
        controller.pause();
        continue;
      case 'resume':
        controller.resume();
        await settle(controller);
        continue;
      case 'abort':
        controller.abort();
        await settle(controller);
        continue;
      case 'connect':
        await controller.connect().catch((err: unknown) => {
          console.error(chalk.red(ErrorHandler.toError(err).message));
        });
        continue;
      case 'disconnect':
        await controller.disconnect();
        continue;
    }

    try {
      const priority = input.startsWith('!');
      const result = controller.send(parseCommandLine(priority ? input.slice(1) : input), { priority });
      if (!result.accepted) {
        console.error(chalk.red(`Rejected: ${result.reason}`));
        continue;
      }
      await settle(controller);
    } catch (err) {
      console.error(chalk.red(ErrorHandler.formatError(ErrorHandler.toError(err))));
    }
  }
}

if (process.argv.length <= 2) {
  program.help();
}

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(ErrorHandler.toError(err).message));
  process.exit(1);
});
