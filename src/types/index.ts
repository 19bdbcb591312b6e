export type StreamName = 'stdout' | 'stderr';

export type OutputCallback = (line: string, stream: StreamName) => void;

export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

/**
 * Fingerprint of the boot cycle the remote is in. `bootId` wins over
 * `btime` when both tiers are available; a snapshot with neither is unknown.
 */
export interface BootIdentity {
  readonly bootId?: string;
  readonly btime?: number;
}

export interface ProbeResult {
  ok: boolean;
  reason: string;
  latencyMs?: number;
  error?: string;
}

export interface LivenessReport {
  alive: boolean;
  reasons: Record<string, string>;
}

export interface DetachedExecutionContext {
  readonly logPath: string;
  readonly exitCodePath: string;
}

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface SessionOptions {
  host: string;
  port?: number;
  username: string;
  privateKeyPath: string;
  /** Connection (handshake) timeout in ms. */
  timeout?: number;
}

export interface ExecuteOptions {
  onLine?: OutputCallback;
  /** Fires only when the command has produced no output at all. */
  timeout?: number;
  /** Quiet period after which the session is re-verified. */
  inactivityTimeout?: number;
  verbose?: boolean;
}

export interface ExecuteLongOptions {
  onLine?: OutputCallback;
  pollInterval?: number;
  timeout?: number;
  verbose?: boolean;
}

export interface RetryPolicy {
  maxRetries: number;
  delay: number;
}

export interface ProbeSettings {
  ports: number[];
  tcpTimeout: number;
  icmpTimeout: number;
}

export interface LongRunningSettings {
  pollInterval: number;
  timeout: number;
  launchSettle: number;
  remoteDir: string;
}

export interface SessionSettings {
  connectTimeout: number;
  commandTimeout: number;
  inactivityTimeout: number;
  channelPollInterval: number;
  reconnect: RetryPolicy;
  resilience: RetryPolicy;
  longRunning: LongRunningSettings;
  probe: ProbeSettings;
}

export interface ConnectionProfile {
  name: string;
  host: string;
  port?: number;
  username: string;
  privateKeyPath: string;
  isDefault?: boolean;
}
