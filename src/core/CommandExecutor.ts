import { StringDecoder } from 'string_decoder';
import { Logger } from '../utils/logger.js';
import { delay } from '../utils/delay.js';
import { ExecResult, ExecuteOptions } from '../types/index.js';
import { CommandChannel } from '../transport/RemoteShellTransport.js';
import { ConnectionLifecycleManager } from './ConnectionLifecycleManager.js';
import { LineEmitter, defaultPrinter } from './LineEmitter.js';
import { SessionError, describeError, isSessionError } from './SessionError.js';

const READ_CHUNK_SIZE = 4096;

export interface CommandExecutorDefaults {
  timeout: number;
  inactivityTimeout: number;
  pollInterval: number;
}

class StreamReader {
  private decoder = new StringDecoder('utf8');

  constructor(readonly emitter: LineEmitter) {}

  push(data: Buffer): void {
    this.emitter.feed(this.decoder.write(data));
  }

  finish(): void {
    this.emitter.feed(this.decoder.end());
    this.emitter.flush();
  }
}

/**
 * Runs one command per freshly opened channel and drains it by polling.
 *
 * Two timers run side by side: the overall timeout only guards a command
 * that never printed anything, while the inactivity timer merely triggers a
 * connection re-check and lets quiet but healthy commands continue.
 */
export class CommandExecutor {
  private logger = new Logger('CommandExecutor');

  constructor(
    private readonly connection: ConnectionLifecycleManager,
    private readonly defaults: CommandExecutorDefaults
  ) {}

  async execute(command: string, options: ExecuteOptions = {}): Promise<ExecResult> {
    const timeout = options.timeout ?? this.defaults.timeout;
    const inactivityTimeout = options.inactivityTimeout ?? this.defaults.inactivityTimeout;
    const verbose = options.verbose ?? true;
    const callback = options.onLine ?? (verbose ? defaultPrinter : undefined);

    if (!(await this.connection.isConnected())) {
      throw new SessionError('SSH_ERROR', 'Not connected to remote host');
    }

    let channel: CommandChannel;
    try {
      channel = await this.connection.requireHandle().openChannel();
    } catch (error) {
      throw await this.translate(error);
    }

    try {
      await channel.exec(command);
      const stdout = new StreamReader(new LineEmitter(callback, 'stdout'));
      const stderr = new StreamReader(new LineEmitter(callback, 'stderr'));
      await this.drain(channel, stdout, stderr, timeout, inactivityTimeout);

      stdout.finish();
      stderr.finish();
      return {
        stdout: stdout.emitter.collected(),
        stderr: stderr.emitter.collected(),
        exitCode: channel.exitStatus(),
      };
    } catch (error) {
      throw await this.translate(error);
    } finally {
      channel.close();
    }
  }

  private async drain(
    channel: CommandChannel,
    stdout: StreamReader,
    stderr: StreamReader,
    timeout: number,
    inactivityTimeout: number
  ): Promise<void> {
    const startTime = Date.now();
    let lastActivity = startTime;
    let lastVerified = startTime;
    let receivedOutput = false;

    for (;;) {
      let received = false;
      if (channel.recvReady()) {
        const data = channel.recv(READ_CHUNK_SIZE);
        if (data.length > 0) {
          stdout.push(data);
          received = true;
        }
      }
      if (channel.recvStderrReady()) {
        const data = channel.recvStderr(READ_CHUNK_SIZE);
        if (data.length > 0) {
          stderr.push(data);
          received = true;
        }
      }

      const now = Date.now();
      if (received) {
        receivedOutput = true;
        lastActivity = now;
      }

      if (!receivedOutput && now - startTime > timeout) {
        throw new SessionError('OVERALL_TIMEOUT', `Exceeded overall timeout of ${timeout}ms`);
      }

      if (now - Math.max(lastActivity, lastVerified) > inactivityTimeout) {
        if (!(await this.connection.isConnected())) {
          throw new SessionError('LOST_CONNECTION', 'Lost connection during command execution');
        }
        lastVerified = Date.now();
        this.logger.debug(`No output for ${now - lastActivity}ms, connection still up`);
      }

      if (channel.exitStatusReady() && !channel.recvReady() && !channel.recvStderrReady()) {
        return;
      }

      if (!received) {
        await delay(this.defaults.pollInterval);
      }
    }
  }

  private async translate(error: unknown): Promise<SessionError> {
    if (isSessionError(error, 'OVERALL_TIMEOUT') || isSessionError(error, 'LOST_CONNECTION')) {
      return error;
    }
    // A failed read on a dead session is a lost connection, not a command failure.
    if (!(await this.connection.isConnected())) {
      return new SessionError(
        'LOST_CONNECTION',
        `Lost connection during command execution: ${describeError(error)}`,
        error
      );
    }
    this.logger.error(`Streaming exec failed: ${describeError(error)}`);
    return new SessionError(
      'COMMAND_FAILED',
      `Streaming command execution failed: ${describeError(error)}`,
      error
    );
  }
}
