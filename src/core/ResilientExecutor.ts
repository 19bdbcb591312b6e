import { Logger } from '../utils/logger.js';
import { BootIdentity, RetryPolicy } from '../types/index.js';
import { formatBootIdentity, isKnownBoot } from './BootIdentityTracker.js';
import { describeError, isSessionError } from './SessionError.js';

export interface ResilienceHooks {
  snapshotBoot(): Promise<BootIdentity>;
  assertSameBoot(before: BootIdentity): Promise<void>;
  reconnect(policy: RetryPolicy): Promise<boolean>;
  /** Whether a failed recovery left persisted state that a later recovery can resume. */
  canResume(): boolean;
}

/**
 * Produces the result of an interrupted operation after the session is back,
 * by observing state the operation persisted. Receives the triggering error.
 */
export type Recovery<T> = (trigger: unknown) => Promise<T>;

/**
 * Wraps a session operation with boot verification and reconnect-then-recover
 * handling. The operation is never invoked a second time: it may have side
 * effects on the remote, so after a reconnect the result comes from `recover`.
 */
export class ResilientExecutor {
  private logger = new Logger('ResilientExecutor');

  constructor(
    private readonly hooks: ResilienceHooks,
    private readonly policy: RetryPolicy
  ) {}

  async run<T>(name: string, operation: () => Promise<T>, recover: Recovery<T>): Promise<T> {
    let before: BootIdentity | undefined;

    try {
      before = await this.hooks.snapshotBoot();
      const result = await operation();
      await this.hooks.assertSameBoot(before);
      return result;
    } catch (error) {
      this.logger.info(`Error during ${name}: ${describeError(error)}. Attempting to reconnect.`);
      return this.reconnectAndRecover(name, before, error, recover);
    }
  }

  private async reconnectAndRecover<T>(
    name: string,
    before: BootIdentity | undefined,
    error: unknown,
    recover: Recovery<T>
  ): Promise<T> {
    let trigger = error;

    for (;;) {
      try {
        await this.hooks.reconnect(this.policy);
      } catch (reconnectError) {
        this.logger.error(`Reconnection failed after multiple attempts: ${describeError(reconnectError)}`);
        throw trigger;
      }

      if (before !== undefined && isKnownBoot(before)) {
        this.logger.info(`Reconnected, verifying boot identity ${formatBootIdentity(before)}`);
        await this.hooks.assertSameBoot(before);
      } else {
        this.logger.warn(`Reconnected without a boot baseline for ${name}, reboot check skipped`);
      }

      this.logger.info(`Recovering result of ${name} after reconnect`);
      try {
        return await recover(trigger);
      } catch (recoveryError) {
        if (isSessionError(recoveryError, 'OVERALL_TIMEOUT') || !this.hooks.canResume()) {
          throw recoveryError;
        }
        this.logger.info(`Recovery of ${name} interrupted: ${describeError(recoveryError)}. Reconnecting again.`);
        trigger = recoveryError;
      }
    }
  }
}
