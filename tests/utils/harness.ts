import { getDefaultSettings } from '../../src/config/ConfigManager.js';
import { ConnectionLifecycleManager } from '../../src/core/ConnectionLifecycleManager.js';
import { CommandExecutor } from '../../src/core/CommandExecutor.js';
import { HealthProber, ProbeFunctions } from '../../src/core/HealthProber.js';
import { ProbeResult, SessionSettings } from '../../src/types/index.js';
import { FakeCredentialLoader, FakeTransport } from './FakeTransport.js';

export const TEST_TARGET = {
  host: 'test-host',
  port: 22,
  username: 'test-user',
  privateKeyPath: '/keys/test_key',
  timeout: 1000,
};

export function fastSettings(): SessionSettings {
  const settings = getDefaultSettings();
  return {
    ...settings,
    commandTimeout: 2000,
    inactivityTimeout: 2000,
    channelPollInterval: 1,
    reconnect: { maxRetries: 3, delay: 0 },
    resilience: { maxRetries: 5, delay: 0 },
    longRunning: { ...settings.longRunning, pollInterval: 0, launchSettle: 0, timeout: 5000 },
  };
}

export interface RecordingProbes extends ProbeFunctions {
  tcpCalls: Array<[string, number]>;
  icmpCalls: string[];
}

export function recordingProbes(tcpOk = false, icmpOk = false): RecordingProbes {
  const tcpCalls: Array<[string, number]> = [];
  const icmpCalls: string[] = [];
  return {
    tcpCalls,
    icmpCalls,
    tcp: async (host: string, port: number): Promise<ProbeResult> => {
      tcpCalls.push([host, port]);
      return tcpOk ? { ok: true, reason: `${port} ok` } : { ok: false, reason: `${port} timeout` };
    },
    icmp: async (host: string): Promise<ProbeResult> => {
      icmpCalls.push(host);
      return icmpOk ? { ok: true, reason: 'icmp ok' } : { ok: false, reason: 'no reply' };
    },
  };
}

export function createStack(transport: FakeTransport, probes: ProbeFunctions = recordingProbes()) {
  const settings = fastSettings();
  const prober = new HealthProber(TEST_TARGET.host, settings.probe, probes);
  const credentials = new FakeCredentialLoader();
  const connection = new ConnectionLifecycleManager(TEST_TARGET, transport, credentials, prober);
  const executor = new CommandExecutor(connection, {
    timeout: settings.commandTimeout,
    inactivityTimeout: settings.inactivityTimeout,
    pollInterval: settings.channelPollInterval,
  });
  return { settings, prober, credentials, connection, executor };
}
