import { Client as SSHClient, ClientChannel, ConnectConfig } from 'ssh2';
import { Logger } from '../utils/logger.js';
import {
  CommandChannel,
  RemoteShellTransport,
  TransportConnectParams,
  TransportError,
  TransportFailureReason,
  TransportHandle,
} from './RemoteShellTransport.js';

const PROBE_TIMEOUT_MS = 5000;

function errorLevel(error: Error): string | undefined {
  if ('level' in error && typeof error.level === 'string') {
    return error.level;
  }
  return undefined;
}

function classifyClientError(error: Error): TransportFailureReason | undefined {
  switch (errorLevel(error)) {
    case 'client-authentication':
      return 'authentication';
    case 'client-socket':
    case 'client-timeout':
      return 'unreachable';
    case 'protocol':
    case 'handshake':
      return 'protocol';
    default:
      return undefined;
  }
}

/**
 * Channel over an ssh2 exec stream. ssh2 pushes data through events; they are
 * buffered here so the executor can drain them by polling.
 */
class Ssh2CommandChannel implements CommandChannel {
  private stream: ClientChannel | null = null;
  private stdout = Buffer.alloc(0);
  private stderr = Buffer.alloc(0);
  private exitCode: number | null = null;
  private exited = false;
  private closed = false;
  private failure: Error | null = null;

  constructor(private readonly client: SSHClient) {}

  exec(command: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.client.exec(command, (err, stream) => {
        if (err) {
          reject(err);
          return;
        }

        this.stream = stream;
        stream.on('data', (data: Buffer) => {
          this.stdout = Buffer.concat([this.stdout, data]);
        });
        stream.stderr.on('data', (data: Buffer) => {
          this.stderr = Buffer.concat([this.stderr, data]);
        });
        stream.on('exit', (code: number | null) => {
          // Killed by a signal: no exit status, reported as -1.
          this.exited = true;
          this.exitCode = code ?? -1;
        });
        stream.on('error', (error: Error) => {
          this.failure = error;
        });
        stream.on('close', () => {
          // ssh2 closes every channel of a dropped connection without an exit.
          if (!this.exited && this.failure === null) {
            this.failure = new Error('Channel closed without exit status');
          }
          this.closed = true;
        });
        resolve();
      });
    });
  }

  recvReady(): boolean {
    return this.stdout.length > 0 || this.failure !== null;
  }

  recv(maxBytes: number): Buffer {
    this.throwIfFailed(this.stdout);
    const chunk = this.stdout.subarray(0, maxBytes);
    this.stdout = this.stdout.subarray(chunk.length);
    return chunk;
  }

  recvStderrReady(): boolean {
    return this.stderr.length > 0 || this.failure !== null;
  }

  recvStderr(maxBytes: number): Buffer {
    this.throwIfFailed(this.stderr);
    const chunk = this.stderr.subarray(0, maxBytes);
    this.stderr = this.stderr.subarray(chunk.length);
    return chunk;
  }

  // 'close' follows the last data and the exit status, 'exit' alone does not.
  exitStatusReady(): boolean {
    return this.closed && this.failure === null;
  }

  exitStatus(): number {
    return this.exitCode ?? -1;
  }

  close(): void {
    if (this.stream && !this.closed) {
      this.stream.destroy();
    }
  }

  private throwIfFailed(pending: Buffer): void {
    if (this.failure && pending.length === 0) {
      throw this.failure;
    }
  }
}

class Ssh2TransportHandle implements TransportHandle {
  private active = true;

  constructor(private readonly client: SSHClient, private readonly logger: Logger) {
    client.on('close', () => {
      this.active = false;
    });
    client.on('end', () => {
      this.active = false;
    });
    client.on('error', (error: Error) => {
      this.logger.warn(`SSH transport error: ${error.message}`);
      this.active = false;
    });
  }

  isActive(): boolean {
    return this.active;
  }

  /**
   * Runs the shell no-op `:`; ssh2 keeps its keepalive packets internal, so a
   * trivial exec is the lightest round trip the public API offers.
   */
  probe(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error('Transport probe timeout'));
      }, PROBE_TIMEOUT_MS);

      try {
        this.client.exec(':', (err, stream) => {
          if (err) {
            clearTimeout(timeout);
            reject(err);
            return;
          }

          let exited = false;
          let code: number | null = null;
          stream.on('exit', (exitCode: number | null) => {
            exited = true;
            code = exitCode;
          });
          stream.on('close', () => {
            clearTimeout(timeout);
            if (!exited) {
              reject(new Error('Transport probe channel closed without exit status'));
            } else if (code === 0) {
              resolve();
            } else {
              reject(new Error(`Transport probe failed with code ${code}`));
            }
          });
          stream.on('error', (error: Error) => {
            clearTimeout(timeout);
            reject(error);
          });
          stream.resume();
        });
      } catch (error) {
        clearTimeout(timeout);
        reject(error);
      }
    });
  }

  async openChannel(): Promise<CommandChannel> {
    if (!this.active) {
      throw new Error('SSH transport is not active');
    }
    return new Ssh2CommandChannel(this.client);
  }

  close(): void {
    this.active = false;
    this.client.end();
  }
}

export class Ssh2Transport implements RemoteShellTransport {
  private logger = new Logger('Ssh2Transport');

  openSession(params: TransportConnectParams): Promise<TransportHandle> {
    return new Promise<TransportHandle>((resolve, reject) => {
      const client = new SSHClient();
      const config: ConnectConfig = {
        host: params.host,
        port: params.port,
        username: params.username,
        privateKey: params.credential.key,
        readyTimeout: params.timeout,
        tryKeyboard: false,
      };

      this.logger.debug(`[SSH2] Connecting to ${params.host}:${params.port} as ${params.username}`);

      const onError = (error: Error) => {
        client.removeListener('ready', onReady);
        client.on('error', (late: Error) => {
          this.logger.debug(`[SSH2] Ignoring error from failed connection: ${late.message}`);
        });
        client.end();
        const reason = classifyClientError(error);
        reject(
          reason ? new TransportError(error.message, reason, error) : error
        );
      };
      const onReady = () => {
        client.removeListener('error', onError);
        this.logger.debug(`[SSH2] Connection established to ${params.host}`);
        resolve(new Ssh2TransportHandle(client, this.logger));
      };

      client.once('ready', onReady);
      client.once('error', onError);
      client.connect(config);
    });
  }
}
