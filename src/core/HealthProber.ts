import * as net from 'net';
import { execFile } from 'child_process';
import { Logger } from '../utils/logger.js';
import { LivenessReport, ProbeResult, ProbeSettings } from '../types/index.js';

/**
 * TCP connect to `host:port`. An immediate refusal still proves the host's
 * network stack answered, so it counts as ok; only timeouts and other
 * socket errors fail.
 */
export function tcpProbe(host: string, port: number, timeoutMs: number = 300): Promise<ProbeResult> {
  return new Promise<ProbeResult>((resolve) => {
    const start = Date.now();
    const socket = new net.Socket();
    let settled = false;

    const finish = (result: ProbeResult) => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      finish({ ok: true, reason: `${port} ok`, latencyMs: Date.now() - start });
    });
    socket.once('timeout', () => {
      finish({ ok: false, reason: `${port} timeout`, error: 'timeout' });
    });
    socket.once('error', (error: NodeJS.ErrnoException) => {
      const latencyMs = Date.now() - start;
      if (error.code === 'ECONNREFUSED') {
        finish({ ok: true, reason: `${port} refused`, latencyMs });
        return;
      }
      const code = error.code ?? 'unknown';
      finish({ ok: false, reason: `${port} error ${code}`, latencyMs, error: `${code}: ${error.message}` });
    });

    socket.connect(port, host);
  });
}

/**
 * Single ping through the system binary, which needs no raw-socket privilege.
 * Never rejects: a missing binary or no reply is just a failed probe.
 */
export function icmpProbe(host: string, timeoutMs: number = 300): Promise<ProbeResult> {
  const args =
    process.platform === 'win32'
      ? ['-n', '1', '-w', String(timeoutMs), host]
      : ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), '-n', host];

  return new Promise<ProbeResult>((resolve) => {
    const start = Date.now();
    execFile('ping', args, (error) => {
      const latencyMs = Date.now() - start;
      if (!error) {
        resolve({ ok: true, reason: 'icmp ok', latencyMs });
        return;
      }
      const code: unknown = error.code;
      if (code === 'ENOENT') {
        resolve({ ok: false, reason: "unavailable (no 'ping' command)" });
        return;
      }
      if (typeof code === 'number') {
        resolve({ ok: false, reason: 'no reply', latencyMs });
        return;
      }
      resolve({ ok: false, reason: 'error', error: `${error.name}: ${error.message}` });
    });
  });
}

export interface ProbeFunctions {
  tcp: typeof tcpProbe;
  icmp: typeof icmpProbe;
}

/**
 * Layered reachability check. Every dimension runs on every call so the
 * report always carries a reason per dimension; the verdict is their OR.
 */
export class HealthProber {
  private logger = new Logger('HealthProber');

  constructor(
    private readonly host: string,
    private readonly settings: ProbeSettings,
    private readonly probes: ProbeFunctions = { tcp: tcpProbe, icmp: icmpProbe }
  ) {}

  async check(sessionConnected: () => Promise<boolean>): Promise<LivenessReport> {
    const reasons: Record<string, string> = {};

    const sshUp = await sessionConnected();
    reasons.ssh = sshUp ? 'up' : 'down';

    const tcpResults = await Promise.all(
      this.settings.ports.map((port) => this.probes.tcp(this.host, port, this.settings.tcpTimeout))
    );
    this.settings.ports.forEach((port, index) => {
      reasons[`tcp:${port}`] = tcpResults[index].reason;
    });

    const icmp = await this.probes.icmp(this.host, this.settings.icmpTimeout);
    reasons.icmp = icmp.reason;

    const alive = sshUp || tcpResults.some((result) => result.ok) || icmp.ok;
    this.logger.debug(`Liveness of ${this.host}: ${alive ? 'alive' : 'unreachable'}`, reasons);
    return { alive, reasons };
  }
}
