import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { SessionError } from '../../src/core/SessionError.js';
import { StreamName } from '../../src/types/index.js';
import { CommandScript, FakeTransport, ScriptedCommand } from '../utils/FakeTransport.js';
import { createStack } from '../utils/harness.js';

describe('CommandExecutor', () => {
  let commands: Record<string, ScriptedCommand>;
  let transport: FakeTransport;
  let stack: ReturnType<typeof createStack>;

  const script: CommandScript = (command) => commands[command] ?? {};

  beforeEach(async () => {
    commands = {};
    transport = new FakeTransport(script);
    stack = createStack(transport);
    await stack.connection.connect();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('collects stdout, stderr and the exit status', async () => {
    commands['echo hi'] = { stdout: ['hi\n'] };

    await expect(stack.executor.execute('echo hi', { verbose: false })).resolves.toEqual({
      stdout: 'hi\n',
      stderr: '',
      exitCode: 0,
    });
    expect(transport.current.channels[0].closed).toBe(true);
  });

  it('returns a non-zero exit code as a result', async () => {
    commands['false'] = { stderr: ['failed\n'], exitCode: 3 };

    await expect(stack.executor.execute('false', { verbose: false })).resolves.toEqual({
      stdout: '',
      stderr: 'failed\n',
      exitCode: 3,
    });
  });

  it('delivers lines in the order they arrive across both streams', async () => {
    commands.build = {
      stdout: ['out1\n', 'out2\n', 'out3\n'],
      stderr: ['err1\n', 'err2\n'],
    };
    const lines: Array<[string, StreamName]> = [];

    const result = await stack.executor.execute('build', {
      onLine: (line, stream) => lines.push([line, stream]),
    });

    expect(lines).toEqual([
      ['out1\n', 'stdout'],
      ['err1\n', 'stderr'],
      ['out2\n', 'stdout'],
      ['err2\n', 'stderr'],
      ['out3\n', 'stdout'],
    ]);
    expect(result.stdout).toBe('out1\nout2\nout3\n');
    expect(result.stderr).toBe('err1\nerr2\n');
  });

  it('decodes a multi-byte character split across reads', async () => {
    const bytes = Buffer.from('blå\n', 'utf8');
    commands.colour = { stdout: [bytes.subarray(0, 3), bytes.subarray(3)] };

    const result = await stack.executor.execute('colour', { verbose: false });

    expect(result.stdout).toBe('blå\n');
  });

  it('prints lines with their stream prefix by default', async () => {
    const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    commands['echo hi'] = { stdout: ['hi\n'] };

    await stack.executor.execute('echo hi');

    expect(write).toHaveBeenCalledWith('[stdout] hi\n');
  });

  it('prints nothing when verbose is off', async () => {
    const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    commands['echo hi'] = { stdout: ['hi\n'] };

    await stack.executor.execute('echo hi', { verbose: false });

    expect(write).not.toHaveBeenCalledWith('[stdout] hi\n');
  });

  it('refuses to run without an active session', async () => {
    stack.connection.disconnect();

    await expect(stack.executor.execute('echo hi')).rejects.toMatchObject({
      kind: 'SSH_ERROR',
      message: 'Not connected to remote host',
    });
  });

  describe('timeouts', () => {
    it('fails a silent command once the overall timeout elapses', async () => {
      commands.hang = { neverExits: true };

      await expect(
        stack.executor.execute('hang', { verbose: false, timeout: 100, inactivityTimeout: 60000 })
      ).rejects.toMatchObject({
        kind: 'OVERALL_TIMEOUT',
        message: 'Exceeded overall timeout of 100ms',
      });
      expect(transport.current.channels[0].closed).toBe(true);
    });

    it('lets a quiet command continue while the connection is up', async () => {
      commands.quiet = { silentPolls: 5, stdout: ['late\n'] };

      const result = await stack.executor.execute('quiet', { verbose: false, inactivityTimeout: 0 });

      expect(result.stdout).toBe('late\n');
      expect(transport.current.probeCount).toBeGreaterThan(1);
    });

    it('reports a lost connection when the inactivity check fails', async () => {
      commands.stall = { neverExits: true, dropConnection: true };

      await expect(
        stack.executor.execute('stall', { verbose: false, timeout: 60000, inactivityTimeout: 20 })
      ).rejects.toMatchObject({
        kind: 'LOST_CONNECTION',
        message: 'Lost connection during command execution',
      });
    });
  });

  describe('read failures', () => {
    it('maps a failed read on a dead session to a lost connection', async () => {
      const reset = new Error('Connection reset by peer');
      commands.tail = { readError: reset, dropConnection: true };

      const error = await stack.executor.execute('tail', { verbose: false }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SessionError);
      expect(error).toMatchObject({
        kind: 'LOST_CONNECTION',
        message: 'Lost connection during command execution: Connection reset by peer',
        cause: reset,
      });
    });

    it('maps a failed read on a live session to a command failure', async () => {
      const boom = new Error('boom');
      commands.tail = { readError: boom };

      await expect(stack.executor.execute('tail', { verbose: false })).rejects.toMatchObject({
        kind: 'COMMAND_FAILED',
        message: 'Streaming command execution failed: boom',
        cause: boom,
      });
      expect(transport.current.channels[0].closed).toBe(true);
    });
  });
});
