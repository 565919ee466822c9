import { SerialPort } from 'serialport';
import { INBOUND_LIMIT } from '../src/connections/BaseLink';
import { LocalLink, classifySerialError } from '../src/connections/LocalLink';
import { TransportIOError, TransportOpenError } from '../src/utils/error-handler';
import { FakeSerialPort, errnoError } from './helpers/fakes';

jest.mock('serialport', () => ({
  SerialPort: { list: jest.fn() },
}));

const timeouts = { connectTimeoutMs: 500, sendTimeoutMs: 500, receiveTimeoutMs: 500 };

describe('LocalLink', () => {
  let port: FakeSerialPort;
  let link: LocalLink;

  beforeEach(() => {
    port = new FakeSerialPort();
    link = new LocalLink({ ...timeouts, path: '/dev/ttyTEST0', baudRate: 115200, portFactory: () => port });
  });

  afterEach(async () => {
    await link.close();
  });

  test('should open the port and exchange bytes', async () => {
    await link.open();
    await link.send(Buffer.from([0x07, 0x00]));
    port.feed([0x02, 0x20, 0x00]);

    expect(link.isAlive()).toBe(true);
    expect(port.written).toEqual([Buffer.from([0x07, 0x00])]);
    await expect(link.receive()).resolves.toEqual(Buffer.from([0x02, 0x20, 0x00]));
    expect(link.getTrafficHistory().map((entry) => [entry.direction, entry.hex])).toEqual([
      ['out', '0700'],
      ['in', '022000'],
    ]);
  });

  test('should describe itself by path and baud rate', () => {
    expect(link.description).toBe('serial /dev/ttyTEST0@115200');
  });

  test('should refuse to send before open', async () => {
    await expect(link.send(Buffer.alloc(12))).rejects.toThrow(
      new TransportIOError('serial /dev/ttyTEST0@115200 is not open')
    );
  });

  test('should time out a receive with no reply', async () => {
    await link.open();
    await expect(link.receive(20)).rejects.toThrow('No reply within 20ms');
  });

  test.each([
    [errnoError('ENOENT', 'No such file or directory, cannot open /dev/ttyTEST0'), 'NotFound'],
    [new Error('Error Resource temporarily unavailable Cannot lock port'), 'Busy'],
    [errnoError('EACCES', 'Permission denied, cannot open /dev/ttyTEST0'), 'PermissionDenied'],
    [new Error('Something odd'), 'Unknown'],
  ])('should classify open failure %#', async (error, reason) => {
    const failing = new LocalLink({
      ...timeouts,
      path: '/dev/ttyTEST0',
      baudRate: 115200,
      portFactory: () => new FakeSerialPort(error),
    });

    await expect(failing.open()).rejects.toMatchObject({ reason });
    expect(failing.isAlive()).toBe(false);
  });

  test('should keep only the newest unread chunks', async () => {
    await link.open();
    for (let i = 0; i < INBOUND_LIMIT + 6; i++) port.feed([i]);

    await expect(link.receive()).resolves.toEqual(Buffer.from([6]));
  });

  test('should report an unplugged port as lost', async () => {
    const lost = jest.fn();
    link.onLost(lost);
    await link.open();
    const pending = link.receive(1000);

    port.unplug();

    await expect(pending).rejects.toThrow('serial /dev/ttyTEST0@115200 lost: disconnected');
    expect(lost).toHaveBeenCalledTimes(1);
    expect(link.isAlive()).toBe(false);
  });

  test('should list serial devices', async () => {
    jest.mocked(SerialPort.list).mockResolvedValue([
      {
        path: '/dev/ttyTEST0',
        manufacturer: 'Test Labs',
        serialNumber: 'SN-0001',
        pnpId: undefined,
        locationId: undefined,
        vendorId: '9588',
        productId: '9899',
      },
    ]);

    await expect(LocalLink.listDevices()).resolves.toEqual([
      {
        path: '/dev/ttyTEST0',
        manufacturer: 'Test Labs',
        serialNumber: 'SN-0001',
        vendorId: '9588',
        productId: '9899',
      },
    ]);
  });
});

describe('classifySerialError', () => {
  test('should keep the path and errno code in the details', () => {
    const error = classifySerialError(errnoError('EBUSY', 'Resource busy'), '/dev/ttyTEST1');

    expect(error).toBeInstanceOf(TransportOpenError);
    expect(error.reason).toBe('Busy');
    expect(error.message).toBe('Serial device /dev/ttyTEST1 is in use');
    expect(error.details).toEqual({ path: '/dev/ttyTEST1', code: 'EBUSY', reason: 'Busy' });
  });
});
