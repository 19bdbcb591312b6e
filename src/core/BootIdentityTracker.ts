import { Logger } from '../utils/logger.js';
import { BootIdentity } from '../types/index.js';
import { CommandExecutor } from './CommandExecutor.js';
import { ConnectionLifecycleManager } from './ConnectionLifecycleManager.js';
import { SessionError } from './SessionError.js';

const BOOT_ID_COMMAND = 'cat /proc/sys/kernel/random/boot_id 2>/dev/null || true';
const BTIME_COMMAND = "awk '/^btime /{print $2}' /proc/stat 2>/dev/null || true";

export function isKnownBoot(identity: BootIdentity): boolean {
  return identity.bootId !== undefined || identity.btime !== undefined;
}

export function formatBootIdentity(identity: BootIdentity): string {
  if (identity.bootId !== undefined) {
    return `boot_id=${identity.bootId}`;
  }
  if (identity.btime !== undefined) {
    return `btime=${identity.btime}`;
  }
  return 'unknown';
}

/**
 * Tiered comparison: the tier is chosen by what `before` holds and only that
 * tier is compared. A value missing on the `after` side is indeterminate and
 * passes, since a failed read does not prove a reboot.
 */
export function compareBootIdentities(before: BootIdentity, after: BootIdentity): void {
  if (before.bootId !== undefined) {
    if (after.bootId !== undefined && after.bootId !== before.bootId) {
      throw new SessionError(
        'UNEXPECTED_REBOOT',
        `Reboot detected via boot_id: ${before.bootId} -> ${after.bootId}`
      );
    }
    return;
  }

  if (before.btime !== undefined) {
    if (after.btime !== undefined && after.btime !== before.btime) {
      throw new SessionError(
        'UNEXPECTED_REBOOT',
        `Reboot detected via btime: ${before.btime} -> ${after.btime}`
      );
    }
  }
}

export class BootIdentityTracker {
  private logger = new Logger('BootIdentityTracker');

  constructor(
    private readonly connection: ConnectionLifecycleManager,
    private readonly executor: CommandExecutor
  ) {}

  async snapshot(timeout: number): Promise<BootIdentity> {
    if (!(await this.connection.isConnected())) {
      throw new SessionError('SSH_ERROR', 'Not connected to remote host');
    }

    const bootIdResult = await this.executor.execute(BOOT_ID_COMMAND, { verbose: false, timeout });
    const bootId = bootIdResult.stdout.trim();
    if (bootIdResult.exitCode === 0 && bootId) {
      return { bootId };
    }

    const btimeResult = await this.executor.execute(BTIME_COMMAND, { verbose: false, timeout });
    const btime = btimeResult.stdout.trim();
    if (/^\d+$/.test(btime)) {
      return { btime: Number.parseInt(btime, 10) };
    }

    this.logger.warn('Boot identity unavailable, reboot detection disabled for this snapshot');
    return {};
  }

  async assertSameBoot(before: BootIdentity, timeout: number): Promise<void> {
    const after = await this.snapshot(timeout);
    this.logger.debug(`Boot identity ${formatBootIdentity(before)} -> ${formatBootIdentity(after)}`);
    compareBootIdentities(before, after);
  }
}
