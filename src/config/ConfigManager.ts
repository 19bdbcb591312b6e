import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';
import { homedir } from 'os';
import { Logger } from '../utils/logger.js';
import { ConnectionProfile, SessionOptions, SessionSettings } from '../types/index.js';

/**
 * Configuration Manager for session defaults and connection profiles.
 * The file is optional; environment variables override both file and defaults.
 */
export interface RemoteSessionConfig {
  connectionProfiles: ConnectionProfile[];
  defaultConnectionProfile?: string;
  settings: SessionSettings;
}

type PartialConfig = Partial<Omit<RemoteSessionConfig, 'settings'>> & {
  settings?: Partial<SessionSettings>;
};

export function getDefaultSettings(): SessionSettings {
  return {
    connectTimeout: 30000,
    commandTimeout: 60000,
    inactivityTimeout: 10000,
    channelPollInterval: 10,
    reconnect: { maxRetries: 3, delay: 2000 },
    resilience: { maxRetries: 5, delay: 2000 },
    longRunning: {
      pollInterval: 1000,
      timeout: 3600000,
      launchSettle: 500,
      remoteDir: '/tmp',
    },
    probe: {
      ports: [22, 80, 443],
      tcpTimeout: 300,
      icmpTimeout: 300,
    },
  };
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number.parseInt(value.trim(), 10);
}

export class ConfigManager {
  private static instance: ConfigManager;
  private config: RemoteSessionConfig;
  private logger: Logger;

  constructor(
    private readonly configPath: string = ConfigManager.getDefaultConfigPath(),
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.logger = new Logger('ConfigManager');
    this.config = this.loadConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private static getDefaultConfigPath(): string {
    return process.env.REMOTE_SESSION_CONFIG || join(homedir(), '.remote-session', 'config.json');
  }

  private loadConfig(): RemoteSessionConfig {
    const defaults: RemoteSessionConfig = {
      connectionProfiles: [],
      settings: getDefaultSettings(),
    };

    let loaded: PartialConfig = {};
    try {
      if (existsSync(this.configPath)) {
        loaded = JSON.parse(readFileSync(this.configPath, 'utf-8')) as PartialConfig;
      }
    } catch (error) {
      this.logger.warn(`Failed to load config from ${this.configPath}: ${error}`);
    }

    const fileSettings = loaded.settings ?? {};
    const config: RemoteSessionConfig = {
      connectionProfiles: loaded.connectionProfiles ?? defaults.connectionProfiles,
      defaultConnectionProfile: loaded.defaultConnectionProfile,
      settings: {
        ...defaults.settings,
        ...fileSettings,
        reconnect: { ...defaults.settings.reconnect, ...fileSettings.reconnect },
        resilience: { ...defaults.settings.resilience, ...fileSettings.resilience },
        longRunning: { ...defaults.settings.longRunning, ...fileSettings.longRunning },
        probe: { ...defaults.settings.probe, ...fileSettings.probe },
      },
    };

    this.applyEnvironment(config.settings);
    return config;
  }

  private applyEnvironment(settings: SessionSettings): void {
    const connectTimeout = parseInteger(this.env.REMOTE_SESSION_CONNECT_TIMEOUT);
    if (connectTimeout !== undefined) {
      settings.connectTimeout = connectTimeout;
    }

    const commandTimeout = parseInteger(this.env.REMOTE_SESSION_COMMAND_TIMEOUT);
    if (commandTimeout !== undefined) {
      settings.commandTimeout = commandTimeout;
    }

    const ports = this.env.REMOTE_SESSION_PROBE_PORTS;
    if (ports) {
      const parsed = ports.split(',').map((port) => parseInteger(port));
      if (parsed.length > 0 && parsed.every((port): port is number => port !== undefined)) {
        settings.probe = { ...settings.probe, ports: parsed };
      } else {
        this.logger.warn(`Ignoring invalid REMOTE_SESSION_PROBE_PORTS: ${ports}`);
      }
    }
  }

  private saveConfig(): void {
    try {
      const dir = dirname(this.configPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        this.logger.info(`Created config directory: ${dir}`);
      }
      writeFileSync(this.configPath, JSON.stringify(this.config, null, 2));
      this.logger.debug(`Config saved to ${this.configPath}`);
    } catch (error) {
      this.logger.error(`Failed to save config: ${error}`);
    }
  }

  // Connection Profile Management
  public addConnectionProfile(profile: ConnectionProfile): void {
    const existingIndex = this.config.connectionProfiles.findIndex(p => p.name === profile.name);

    if (existingIndex >= 0) {
      this.config.connectionProfiles[existingIndex] = profile;
      this.logger.info(`Updated connection profile: ${profile.name}`);
    } else {
      this.config.connectionProfiles.push(profile);
      this.logger.info(`Added connection profile: ${profile.name}`);
    }

    // Set as default if it's the only profile or marked as default
    if (this.config.connectionProfiles.length === 1 || profile.isDefault) {
      this.config.defaultConnectionProfile = profile.name;
      this.config.connectionProfiles.forEach(p => {
        if (p.name !== profile.name) {
          p.isDefault = false;
        }
      });
    }

    this.saveConfig();
  }

  public getConnectionProfile(name?: string): ConnectionProfile | undefined {
    const profileName = name ?? this.config.defaultConnectionProfile;
    if (profileName === undefined) {
      return this.config.connectionProfiles[0];
    }
    return this.config.connectionProfiles.find(p => p.name === profileName);
  }

  public removeConnectionProfile(name: string): boolean {
    const index = this.config.connectionProfiles.findIndex(p => p.name === name);
    if (index < 0) {
      return false;
    }

    this.config.connectionProfiles.splice(index, 1);
    if (this.config.defaultConnectionProfile === name) {
      this.config.defaultConnectionProfile = this.config.connectionProfiles[0]?.name;
    }

    this.saveConfig();
    this.logger.info(`Removed connection profile: ${name}`);
    return true;
  }

  public listConnectionProfiles(): ConnectionProfile[] {
    return this.config.connectionProfiles.map(profile => ({ ...profile }));
  }

  public getSettings(): SessionSettings {
    return this.config.settings;
  }

  /** Resolves a profile into session options with defaults applied. */
  public getSessionOptions(profileName?: string): SessionOptions | undefined {
    const profile = this.getConnectionProfile(profileName);
    if (!profile) {
      return undefined;
    }

    return {
      host: profile.host,
      port: profile.port ?? 22,
      username: profile.username,
      privateKeyPath: profile.privateKeyPath,
      timeout: this.config.settings.connectTimeout,
    };
  }

  public getConfigFilePath(): string {
    return this.configPath;
  }
}
