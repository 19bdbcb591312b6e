import { EventEmitter } from 'events';
import { Logger } from '../utils/logger.js';
import { ConfigManager } from '../config/ConfigManager.js';
import {
  BootIdentity,
  ExecResult,
  ExecuteLongOptions,
  ExecuteOptions,
  LivenessReport,
  SessionOptions,
  SessionSettings,
} from '../types/index.js';
import { CredentialLoader, RemoteShellTransport } from '../transport/RemoteShellTransport.js';
import { Ssh2Transport } from '../transport/Ssh2Transport.js';
import { KeyFileCredentialLoader } from '../transport/KeyFileCredentialLoader.js';
import { BootIdentityTracker } from './BootIdentityTracker.js';
import { CommandExecutor } from './CommandExecutor.js';
import { ConnectionLifecycleManager } from './ConnectionLifecycleManager.js';
import { HealthProber, ProbeFunctions } from './HealthProber.js';
import { LongRunningExecutor } from './LongRunningExecutor.js';
import { ResilientExecutor } from './ResilientExecutor.js';
import { SessionError } from './SessionError.js';

const DEFAULT_BOOT_SNAPSHOT_TIMEOUT = 3000;

export interface RemoteSessionDependencies {
  transport?: RemoteShellTransport;
  credentials?: CredentialLoader;
  settings?: SessionSettings;
  probes?: ProbeFunctions;
}

/**
 * One logical session to a remote POSIX host. Calls must be sequential:
 * the session holds a single transport handle and at most one outstanding
 * detached execution.
 *
 * Re-emits `connected`, `disconnected`, `state` and `reconnect-attempt`
 * from its connection manager.
 */
export class RemoteSession extends EventEmitter {
  private logger = new Logger('RemoteSession');
  private readonly settings: SessionSettings;
  private readonly connection: ConnectionLifecycleManager;
  private readonly executor: CommandExecutor;
  private readonly bootTracker: BootIdentityTracker;
  private readonly longRunning: LongRunningExecutor;
  private readonly resilient: ResilientExecutor;

  constructor(options: SessionOptions, deps: RemoteSessionDependencies = {}) {
    super();
    this.settings = deps.settings ?? ConfigManager.getInstance().getSettings();

    const prober = new HealthProber(options.host, this.settings.probe, deps.probes);
    this.connection = new ConnectionLifecycleManager(
      {
        host: options.host,
        port: options.port ?? 22,
        username: options.username,
        privateKeyPath: options.privateKeyPath,
        timeout: options.timeout ?? this.settings.connectTimeout,
      },
      deps.transport ?? new Ssh2Transport(),
      deps.credentials ?? new KeyFileCredentialLoader(),
      prober
    );
    for (const event of ['connected', 'disconnected', 'state', 'reconnect-attempt']) {
      this.connection.on(event, (...args: unknown[]) => this.emit(event, ...args));
    }

    this.executor = new CommandExecutor(this.connection, {
      timeout: this.settings.commandTimeout,
      inactivityTimeout: this.settings.inactivityTimeout,
      pollInterval: this.settings.channelPollInterval,
    });
    this.bootTracker = new BootIdentityTracker(this.connection, this.executor);
    this.longRunning = new LongRunningExecutor(this.executor, this.settings.longRunning);
    this.resilient = new ResilientExecutor(
      {
        snapshotBoot: () => this.bootTracker.snapshot(DEFAULT_BOOT_SNAPSHOT_TIMEOUT),
        assertSameBoot: (before) => this.bootTracker.assertSameBoot(before, DEFAULT_BOOT_SNAPSHOT_TIMEOUT),
        reconnect: (policy) => this.connection.reconnect(policy.maxRetries, policy.delay),
        canResume: () => this.longRunning.pending() !== null,
      },
      this.settings.resilience
    );
  }

  /** Builds a session from a stored connection profile. */
  static fromProfile(
    profileName?: string,
    config: ConfigManager = ConfigManager.getInstance(),
    deps: RemoteSessionDependencies = {}
  ): RemoteSession {
    const options = config.getSessionOptions(profileName);
    if (!options) {
      throw new SessionError('UNEXPECTED', `Connection profile not found: ${profileName ?? '(default)'}`);
    }
    return new RemoteSession(options, { settings: config.getSettings(), ...deps });
  }

  /** Connects, runs `fn`, and always disconnects afterwards. */
  static async withSession<T>(
    options: SessionOptions,
    fn: (session: RemoteSession) => Promise<T>,
    deps: RemoteSessionDependencies = {}
  ): Promise<T> {
    const session = new RemoteSession(options, deps);
    await session.connect();
    try {
      return await fn(session);
    } finally {
      session.disconnect();
    }
  }

  connect(): Promise<boolean> {
    return this.connection.connect();
  }

  disconnect(): void {
    this.connection.disconnect();
  }

  isConnected(): Promise<boolean> {
    return this.connection.isConnected();
  }

  isAlive(): Promise<LivenessReport> {
    return this.connection.isAlive();
  }

  reconnect(
    maxRetries: number = this.settings.reconnect.maxRetries,
    delayMs: number = this.settings.reconnect.delay
  ): Promise<boolean> {
    return this.connection.reconnect(maxRetries, delayMs);
  }

  /**
   * Runs a foreground command. A dropped connection is reconnected, but the
   * command is not re-run and has nothing persisted to recover from, so that
   * path ends in `RECOVERY_UNAVAILABLE`.
   */
  execute(command: string, options: ExecuteOptions = {}): Promise<ExecResult> {
    return this.resilient.run(
      'execute',
      () => this.executor.execute(command, options),
      (trigger) => this.longRunning.recover(trigger)
    );
  }

  /** Runs a command detached from the session, resuming the poll after reconnects. */
  async executeLong(command: string, options: ExecuteLongOptions = {}): Promise<ExecResult> {
    try {
      return await this.resilient.run(
        'executeLong',
        () => this.longRunning.run(command, options),
        (trigger) => this.longRunning.recover(trigger)
      );
    } finally {
      if (this.longRunning.pending() !== null) {
        this.logger.warn('Detached execution left unfinished');
      }
      this.longRunning.clear();
    }
  }

  snapshotBootIdentity(timeout: number = DEFAULT_BOOT_SNAPSHOT_TIMEOUT): Promise<BootIdentity> {
    return this.bootTracker.snapshot(timeout);
  }

  assertSameBoot(before: BootIdentity, timeout: number = DEFAULT_BOOT_SNAPSHOT_TIMEOUT): Promise<void> {
    return this.bootTracker.assertSameBoot(before, timeout);
  }

  toString(): string {
    const status = this.connection.getState() === 'connected' ? 'connected' : 'disconnected';
    return `RemoteSession(${this.connection.label}, ${status})`;
  }
}
