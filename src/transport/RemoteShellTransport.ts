export interface PrivateKeyCredential {
  /** Parsed key material, ready to hand to the transport. */
  key: string | Buffer;
  path: string;
}

export interface TransportConnectParams {
  host: string;
  port: number;
  username: string;
  credential: PrivateKeyCredential;
  timeout: number;
}

export type TransportFailureReason = 'authentication' | 'unreachable' | 'protocol';

/**
 * Raised by transports for failures they can classify. Anything else thrown
 * from `openSession` is treated as unexpected by the caller.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly reason: TransportFailureReason,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * A command channel read by polling: readiness checks never block and
 * `recv` returns whatever is buffered, up to `maxBytes`.
 */
export interface CommandChannel {
  exec(command: string): Promise<void>;
  recvReady(): boolean;
  recv(maxBytes: number): Buffer;
  recvStderrReady(): boolean;
  recvStderr(maxBytes: number): Buffer;
  exitStatusReady(): boolean;
  exitStatus(): number;
  close(): void;
}

export interface TransportHandle {
  /** Cached transport state; may still be true after the socket died. */
  isActive(): boolean;
  /** Round trip over the live connection; rejects on any I/O failure. */
  probe(): Promise<void>;
  openChannel(): Promise<CommandChannel>;
  close(): void;
}

export interface RemoteShellTransport {
  openSession(params: TransportConnectParams): Promise<TransportHandle>;
}

export interface CredentialLoader {
  load(keyPath: string): Promise<PrivateKeyCredential>;
}
