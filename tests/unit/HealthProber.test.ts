import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as net from 'net';
import { execFile } from 'child_process';
import { HealthProber, icmpProbe, tcpProbe } from '../../src/core/HealthProber.js';
import { recordingProbes } from '../utils/harness.js';

jest.mock('child_process', () => ({
  execFile: jest.fn(),
}));

type PingCallback = (error: Error | null) => void;
const mockExecFile = execFile as unknown as jest.Mock<(file: string, args: string[], callback: PingCallback) => void>;

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server has no TCP address'));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('tcpProbe', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports ok when the port accepts the connection', async () => {
    const server = net.createServer((socket) => socket.destroy());
    const port = await listen(server);

    try {
      const result = await tcpProbe('127.0.0.1', port, 1000);
      expect(result.ok).toBe(true);
      expect(result.reason).toBe(`${port} ok`);
    } finally {
      await close(server);
    }
  });

  it('counts an active refusal as a live host', async () => {
    const server = net.createServer();
    const port = await listen(server);
    await close(server);

    const result = await tcpProbe('127.0.0.1', port, 1000);

    expect(result.ok).toBe(true);
    expect(result.reason).toBe(`${port} refused`);
  });

  it('fails when nothing answers before the timeout', async () => {
    // The SYN goes nowhere: connect() is swallowed so only the timer can settle.
    jest.spyOn(net.Socket.prototype, 'connect').mockImplementation(function (this: net.Socket) {
      return this;
    });

    const result = await tcpProbe('192.0.2.1', 22, 50);

    expect(result).toEqual({ ok: false, reason: '22 timeout', error: 'timeout' });
  });
});

describe('icmpProbe', () => {
  beforeEach(() => {
    mockExecFile.mockReset();
  });

  it('reports ok on a reply', async () => {
    mockExecFile.mockImplementation((_file, _args, callback) => callback(null));

    const result = await icmpProbe('10.0.0.5', 300);

    expect(result.ok).toBe(true);
    expect(result.reason).toBe('icmp ok');
    const expectedArgs = process.platform === 'win32' ? ['-n', '1', '-w', '300', '10.0.0.5'] : ['-c', '1', '-W', '1', '-n', '10.0.0.5'];
    expect(mockExecFile.mock.calls[0][0]).toBe('ping');
    expect(mockExecFile.mock.calls[0][1]).toEqual(expectedArgs);
  });

  it('reports no reply on a non-zero exit', async () => {
    mockExecFile.mockImplementation((_file, _args, callback) =>
      callback(Object.assign(new Error('Command failed: ping'), { code: 1 }))
    );

    const result = await icmpProbe('10.0.0.5');

    expect(result.ok).toBe(false);
    expect(result.reason).toBe('no reply');
  });

  it('reports the missing ping binary without throwing', async () => {
    mockExecFile.mockImplementation((_file, _args, callback) =>
      callback(Object.assign(new Error('spawn ping ENOENT'), { code: 'ENOENT' }))
    );

    await expect(icmpProbe('10.0.0.5')).resolves.toEqual({
      ok: false,
      reason: "unavailable (no 'ping' command)",
    });
  });
});

describe('HealthProber', () => {
  const settings = { ports: [22, 80, 443], tcpTimeout: 300, icmpTimeout: 300 };

  it('reports every dimension even when the session is up', async () => {
    const probes = recordingProbes();
    const prober = new HealthProber('test-host', settings, probes);

    const report = await prober.check(async () => true);

    expect(report).toEqual({
      alive: true,
      reasons: {
        ssh: 'up',
        'tcp:22': '22 timeout',
        'tcp:80': '80 timeout',
        'tcp:443': '443 timeout',
        icmp: 'no reply',
      },
    });
    expect(probes.tcpCalls).toEqual([
      ['test-host', 22],
      ['test-host', 80],
      ['test-host', 443],
    ]);
    expect(probes.icmpCalls).toEqual(['test-host']);
  });

  it('is alive when only a TCP port answers', async () => {
    const prober = new HealthProber('test-host', settings, recordingProbes(true, false));

    const report = await prober.check(async () => false);

    expect(report.alive).toBe(true);
    expect(report.reasons.ssh).toBe('down');
    expect(report.reasons['tcp:80']).toBe('80 ok');
  });

  it('is alive when only ICMP answers', async () => {
    const prober = new HealthProber('test-host', settings, recordingProbes(false, true));

    const report = await prober.check(async () => false);

    expect(report.alive).toBe(true);
    expect(report.reasons.icmp).toBe('icmp ok');
  });

  it('is unreachable when every layer fails', async () => {
    const prober = new HealthProber('test-host', { ...settings, ports: [2222] }, recordingProbes());

    const report = await prober.check(async () => false);

    expect(report).toEqual({
      alive: false,
      reasons: { ssh: 'down', 'tcp:2222': '2222 timeout', icmp: 'no reply' },
    });
  });
});
