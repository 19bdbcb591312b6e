import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../utils/logger.js';
import { delay } from '../utils/delay.js';
import {
  DetachedExecutionContext,
  ExecResult,
  ExecuteLongOptions,
  LongRunningSettings,
} from '../types/index.js';
import { CommandExecutor } from './CommandExecutor.js';
import { LineEmitter, defaultPrinter } from './LineEmitter.js';
import { SessionError, describeError } from './SessionError.js';

const LAUNCH_INACTIVITY_TIMEOUT = 5000;
const POLL_READ_TIMEOUT = 5000;
const FINAL_READ_TIMEOUT = 10000;

/** Progress of one detached command, kept so polling can resume after a reconnect. */
export interface DetachedExecution {
  readonly context: DetachedExecutionContext;
  readonly emitter: LineEmitter;
  readonly startedAt: number;
  readonly pollInterval: number;
  readonly timeout: number;
  offset: number;
}

export function createDetachedContext(remoteDir: string): DetachedExecutionContext {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
  const logPath = `${remoteDir.replace(/\/+$/, '')}/nohup_${suffix}.log`;
  return { logPath, exitCodePath: `${logPath}.exit` };
}

export function buildDetachedCommand(command: string, context: DetachedExecutionContext): string {
  const escaped = command.replace(/'/g, `'\\''`);
  return (
    `nohup bash -c '(${escaped}) > ${context.logPath} 2>&1; ` +
    `echo $? > ${context.exitCodePath}' >/dev/null 2>&1 &`
  );
}

/**
 * Runs commands detached from the session: only the launch is bound to a
 * channel; output and exit status are recovered by polling two remote files.
 */
export class LongRunningExecutor {
  private logger = new Logger('LongRunningExecutor');
  private current: DetachedExecution | null = null;

  constructor(
    private readonly executor: CommandExecutor,
    private readonly settings: LongRunningSettings
  ) {}

  /** The execution recovery would resume, if one is outstanding. */
  pending(): DetachedExecution | null {
    return this.current;
  }

  clear(): void {
    this.current = null;
  }

  async run(command: string, options: ExecuteLongOptions = {}): Promise<ExecResult> {
    const verbose = options.verbose ?? true;
    const callback = options.onLine ?? (verbose ? defaultPrinter : undefined);

    if (this.current !== null) {
      this.logger.warn(`Abandoning detached execution ${this.current.context.logPath}`);
    }

    const context = createDetachedContext(this.settings.remoteDir);
    this.current = {
      context,
      emitter: new LineEmitter(callback, 'stdout'),
      startedAt: Date.now(),
      pollInterval: options.pollInterval ?? this.settings.pollInterval,
      timeout: options.timeout ?? this.settings.timeout,
      offset: 0,
    };

    this.logger.info(`Launching detached command, log ${context.logPath}`);
    await this.executor.execute(buildDetachedCommand(command, context), {
      verbose: false,
      inactivityTimeout: LAUNCH_INACTIVITY_TIMEOUT,
    });
    await delay(this.settings.launchSettle);

    const result = await this.follow(this.current);
    this.current = null;
    return result;
  }

  /**
   * Resumes polling the outstanding detached execution. Without one there is
   * nothing persisted to observe and the interrupted work cannot be recovered.
   * A recovery cut short by another disconnect keeps the execution pending.
   */
  async recover(trigger: unknown): Promise<ExecResult> {
    const execution = this.current;
    if (execution === null) {
      this.logger.error('No log file available for verification');
      throw new SessionError(
        'RECOVERY_UNAVAILABLE',
        `No log file or exit code file available for verification after: ${describeError(trigger)}`,
        trigger
      );
    }

    const result = await this.follow(execution);
    this.current = null;
    return result;
  }

  private async follow(execution: DetachedExecution): Promise<ExecResult> {
    const { logPath, exitCodePath } = execution.context;

    for (;;) {
      if (Date.now() - execution.startedAt > execution.timeout) {
        throw new SessionError('OVERALL_TIMEOUT', `Long command exceeded timeout of ${execution.timeout}ms`);
      }

      const exitCode = await this.readExitCode(exitCodePath);
      if (exitCode !== undefined) {
        const finalLog = await this.readLog(logPath, FINAL_READ_TIMEOUT);
        this.feedNewContent(execution, finalLog);
        execution.emitter.flush();

        await this.removeFiles(execution.context);

        const stdout = execution.emitter.collected();
        if (exitCode === 0) {
          this.logger.info('Command completed successfully');
        } else {
          this.logger.error(`Command failed with exit code ${exitCode}`);
        }
        return { stdout, stderr: '', exitCode };
      }

      this.feedNewContent(execution, await this.readLog(logPath, POLL_READ_TIMEOUT));
      await delay(execution.pollInterval);
    }
  }

  // Cleanup failures are logged only; the result is already complete.
  private async removeFiles({ logPath, exitCodePath }: DetachedExecutionContext): Promise<void> {
    try {
      await this.executor.execute(`rm -f ${logPath} ${exitCodePath}`, {
        verbose: false,
        timeout: POLL_READ_TIMEOUT,
      });
    } catch (error) {
      this.logger.warn(`Failed to remove ${logPath}: ${describeError(error)}`);
    }
  }

  private feedNewContent(execution: DetachedExecution, content: string): void {
    if (content.length > execution.offset) {
      execution.emitter.feed(content.slice(execution.offset));
      execution.offset = content.length;
    }
  }

  private async readLog(logPath: string, timeout: number): Promise<string> {
    const result = await this.executor.execute(`cat ${logPath} 2>/dev/null || true`, {
      verbose: false,
      timeout,
    });
    return result.stdout;
  }

  private async readExitCode(exitCodePath: string): Promise<number | undefined> {
    const result = await this.executor.execute(`cat ${exitCodePath} 2>/dev/null || true`, {
      verbose: false,
      timeout: POLL_READ_TIMEOUT,
    });
    const value = result.stdout.trim();
    return /^\d+$/.test(value) ? Number.parseInt(value, 10) : undefined;
  }
}
