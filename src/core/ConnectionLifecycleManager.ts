import { EventEmitter } from 'events';
import { Logger } from '../utils/logger.js';
import { delay } from '../utils/delay.js';
import { ConnectionState, LivenessReport } from '../types/index.js';
import {
  CredentialLoader,
  RemoteShellTransport,
  TransportError,
  TransportHandle,
} from '../transport/RemoteShellTransport.js';
import { HealthProber } from './HealthProber.js';
import { SessionError, describeError, isSessionError } from './SessionError.js';

export interface ConnectionTarget {
  host: string;
  port: number;
  username: string;
  privateKeyPath: string;
  timeout: number;
}

function translateConnectError(error: unknown, target: ConnectionTarget): SessionError {
  if (isSessionError(error)) {
    return error;
  }
  if (error instanceof TransportError) {
    switch (error.reason) {
      case 'authentication':
        return new SessionError('AUTHENTICATION_FAILED', `Authentication failed: ${error.message}`, error);
      case 'unreachable':
        return new SessionError(
          'HOST_UNREACHABLE',
          `Cannot connect to ${target.host}:${target.port}: ${error.message}`,
          error
        );
      case 'protocol':
        return new SessionError('SSH_ERROR', `SSH error: ${error.message}`, error);
    }
  }
  return new SessionError('UNEXPECTED', `Connection error: ${describeError(error)}`, error);
}

/**
 * Owns the single transport handle of a session.
 *
 * Events: `state` (new state), `connected`, `disconnected`,
 * `reconnect-attempt` ({ attempt, maxRetries, liveness }).
 */
export class ConnectionLifecycleManager extends EventEmitter {
  private logger = new Logger('ConnectionLifecycleManager');
  private handle: TransportHandle | null = null;
  private state: ConnectionState = 'disconnected';

  constructor(
    private readonly target: ConnectionTarget,
    private readonly transport: RemoteShellTransport,
    private readonly credentials: CredentialLoader,
    private readonly prober: HealthProber
  ) {
    super();
  }

  getState(): ConnectionState {
    return this.state;
  }

  get label(): string {
    return `${this.target.username}@${this.target.host}:${this.target.port}`;
  }

  /**
   * Opens a fresh transport session, dropping any current one first.
   * Failures are translated to a typed error and never retried here.
   */
  async connect(): Promise<boolean> {
    if (this.handle !== null) {
      this.disconnect();
    }

    this.setState('connecting');
    this.logger.info(`Connecting to ${this.label}`);

    try {
      const credential = await this.credentials.load(this.target.privateKeyPath);
      this.handle = await this.transport.openSession({
        host: this.target.host,
        port: this.target.port,
        username: this.target.username,
        credential,
        timeout: this.target.timeout,
      });
    } catch (error) {
      this.setState('disconnected');
      const translated = translateConnectError(error, this.target);
      this.logger.error(`Connection to ${this.label} failed: ${translated.message}`);
      throw translated;
    }

    this.setState('connected');
    this.logger.info('SSH connection established successfully');
    this.emit('connected');
    return true;
  }

  disconnect(): void {
    if (this.handle === null) {
      return;
    }

    const handle = this.handle;
    this.handle = null;
    try {
      handle.close();
    } catch (error) {
      this.logger.debug(`Error while closing transport: ${describeError(error)}`);
    }
    this.setState('disconnected');
    this.emit('disconnected');
  }

  /**
   * The transport's own flag can lag a dead socket, so a live round trip is
   * also required. Probe failures mean "not connected" and are not raised.
   */
  async isConnected(): Promise<boolean> {
    const handle = this.handle;
    if (handle === null || !handle.isActive()) {
      return false;
    }

    try {
      await handle.probe();
      return true;
    } catch (error) {
      this.logger.debug(`Transport probe failed: ${describeError(error)}`);
      return false;
    }
  }

  /** The live handle, or `SSH_ERROR` when there is none. */
  requireHandle(): TransportHandle {
    if (this.handle === null || !this.handle.isActive()) {
      throw new SessionError('SSH_ERROR', 'Not connected to remote host');
    }
    return this.handle;
  }

  isAlive(): Promise<LivenessReport> {
    return this.prober.check(() => this.isConnected());
  }

  async reconnect(maxRetries: number, delayMs: number): Promise<boolean> {
    this.logger.info(`Starting reconnection to ${this.label}`);
    let lastError: SessionError | undefined;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      this.logger.info(`Reconnection attempt ${attempt}/${maxRetries}`);

      // Diagnostic only: the attempt goes ahead whatever the probes say.
      const liveness = await this.isAlive();
      if (!liveness.alive) {
        this.logger.warn('Host appears unreachable', liveness.reasons);
      }
      this.emit('reconnect-attempt', { attempt, maxRetries, liveness });

      try {
        await this.connect();
        if (await this.isConnected()) {
          this.logger.info(`Reconnection successful on attempt ${attempt}`);
          return true;
        }
        lastError = new SessionError('SSH_ERROR', 'Connection established but transport probe failed');
      } catch (error) {
        lastError = isSessionError(error)
          ? error
          : new SessionError('UNEXPECTED', `Unexpected error during reconnection: ${describeError(error)}`, error);
        this.logger.warn(`Reconnection attempt ${attempt} failed: ${lastError.message}`);
      }

      if (attempt < maxRetries) {
        this.logger.info(`Waiting ${delayMs}ms before next attempt`);
        await delay(delayMs);
      }
    }

    let message = `Failed to reconnect after ${maxRetries} attempts`;
    if (lastError) {
      message += `. Last error: ${lastError.message}`;
    }
    this.logger.error(message);
    throw new SessionError('RECONNECTION_EXHAUSTED', message, lastError);
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.emit('state', state);
    }
  }
}
