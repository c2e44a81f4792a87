/**
 * CLI Manager - Handles all CLI command logic and interactions
 */

import { ConfigManager, AgentConfig, DEFAULT_CONFIG_FILE } from './config-manager';
import { OutputFormatter } from './output-formatter';
import { Agent, createAgent } from '../agent';
import { AgentClient } from '../client/agent-client';
import { EmulatorState, LogLevel, StatusPayload, isOperatingMode } from '../interfaces/common';
import { ConsoleLogger } from '../logging/logger';
import { errorMessage } from '../errors/agent-error';

export interface CLIOptions {
  config?: string;
  verbose?: boolean;
  debug?: boolean;
}

export interface StartOptions {
  host?: string;
  port?: string;
  processName?: string;
  statusFile?: string;
  pollInterval?: string;
  probeTimeout?: string;
  simulated?: boolean;
}

export interface RemoteOptions {
  url?: string;
  json?: boolean;
}

export interface StateOptions extends RemoteOptions {
  demo?: string;
}

export interface ConfigShowOptions {
  json?: boolean;
}

export interface ConfigInitOptions {
  force?: boolean;
  template?: string;
}

export interface ConfigValidateOptions {
  config?: string;
}

export type AgentFactory = (config: AgentConfig, options: { logger: ConsoleLogger }) => Agent;
export type ClientFactory = (baseUrl: string) => AgentClient;

function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseRunning(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case 'on':
    case 'running':
      return true;
    case 'false':
    case 'off':
    case 'stopped':
      return false;
    default:
      throw new Error(`Running state must be one of true, false, on, off, running, stopped; got "${value}"`);
  }
}

/**
 * Manages CLI operations and coordinates with the agent
 */
export class CLIManager {
  private agent: Agent | null = null;
  private outputFormatter: OutputFormatter;
  private logger: ConsoleLogger = new ConsoleLogger('info');
  private initialized = false;

  constructor(
    private configManager: ConfigManager,
    private readonly agentFactory: AgentFactory = createAgent,
    private readonly clientFactory: ClientFactory = (baseUrl) => new AgentClient(baseUrl)
  ) {
    this.outputFormatter = new OutputFormatter();
  }

  /**
   * Initialize CLI manager with configuration
   */
  async initialize(options: CLIOptions): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      const config = await this.configManager.loadConfig(options.config || DEFAULT_CONFIG_FILE);

      let logLevel: LogLevel = config.developer.logLevel;
      if (options.debug || config.developer.debug) {
        logLevel = 'debug';
      } else if (options.verbose && logLevel !== 'debug') {
        logLevel = 'info';
      }
      this.logger = new ConsoleLogger(logLevel);

      this.initialized = true;
    } catch (error) {
      this.outputFormatter.error(`Failed to initialize CLI: ${errorMessage(error)}`);
      throw error;
    }
  }

  getLogger(): ConsoleLogger {
    return this.logger;
  }

  getAgent(): Agent | null {
    return this.agent;
  }

  /**
   * Handle start command: run the agent until cleanup
   */
  async handleStart(options: StartOptions = {}): Promise<void> {
    this.ensureInitialized();

    if (this.agent) {
      throw new Error('Agent already started');
    }

    try {
      const config = this.buildStartConfig(options);
      const agent = this.agentFactory(config, { logger: this.logger });
      const address = await agent.server.start();
      this.agent = agent;

      if (options.simulated) {
        await agent.supervisor.setMode('SIMULATED');
      }

      this.outputFormatter.success('Agent started');
      this.outputFormatter.info(`HTTP:      http://${address.address}:${address.port}`);
      this.outputFormatter.info(`WebSocket: ws://${address.address}:${address.port}/ws`);
      this.outputFormatter.info(`Mode:      ${agent.supervisor.getMode()}`);
      this.outputFormatter.info(`Watching:  ${config.emulator.processName}`);

      agent.supervisor.on('statusChanged', (state: EmulatorState) => {
        const demo = state.currentDemo ? ` (${state.currentDemo})` : '';
        this.outputFormatter.info(`Emulator ${state.running ? 'running' : 'stopped'}${demo} [${state.mode}]`);
      });
    } catch (error) {
      this.outputFormatter.error(`Failed to start agent: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Handle status command against a running agent
   */
  async handleStatus(options: RemoteOptions = {}): Promise<void> {
    this.ensureInitialized();

    try {
      const status = await this.client(options).getStatus();
      this.printStatus(status, options);
    } catch (error) {
      this.outputFormatter.error(`Failed to get status: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Handle mode command: switch between REAL and SIMULATED
   */
  async handleMode(mode: string, options: RemoteOptions = {}): Promise<void> {
    this.ensureInitialized();

    try {
      const normalized = mode.toUpperCase();
      if (!isOperatingMode(normalized)) {
        throw new Error(`Invalid mode: ${mode}. Must be one of REAL, SIMULATED`);
      }

      const status = await this.client(options).setMode(normalized);
      this.outputFormatter.success(`Mode set to ${status.mode}`);
      this.printStatus(status, options);
    } catch (error) {
      this.outputFormatter.error(`Failed to set mode: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Handle state command: force the simulated emulator state
   */
  async handleState(running: string, options: StateOptions = {}): Promise<void> {
    this.ensureInitialized();

    try {
      const status = await this.client(options).setDevState(parseRunning(running), options.demo ?? null);
      this.outputFormatter.success('Simulated state applied');
      this.printStatus(status, options);
    } catch (error) {
      this.outputFormatter.error(`Failed to set state: ${errorMessage(error)}`);
      throw error;
    }
  }

  async handleConfigShow(options: ConfigShowOptions = {}): Promise<void> {
    const config = this.configManager.getConfig();

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
    } else {
      this.outputFormatter.displayConfig(config);
    }
  }

  async handleConfigInit(options: ConfigInitOptions = {}): Promise<void> {
    try {
      await this.configManager.initializeConfig(DEFAULT_CONFIG_FILE, {
        force: options.force || false,
        template: options.template || 'default'
      });

      this.outputFormatter.success(`Configuration file created: ${DEFAULT_CONFIG_FILE}`);
    } catch (error) {
      this.outputFormatter.error(errorMessage(error));
      throw error;
    }
  }

  async handleConfigValidate(options: ConfigValidateOptions = {}): Promise<void> {
    const configPath = options.config || DEFAULT_CONFIG_FILE;
    const result = await this.configManager.validateConfig(configPath);

    if (result.valid) {
      this.outputFormatter.success(`Configuration is valid: ${configPath}`);
    } else {
      this.outputFormatter.error(`Configuration is invalid: ${configPath}: ${result.error}`);
      process.exitCode = 1;
    }
  }

  /**
   * Stop the agent if this process started one
   */
  async cleanup(): Promise<void> {
    const agent = this.agent;
    this.agent = null;
    if (agent) {
      await agent.server.stop();
    }
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('CLI not initialized');
    }
  }

  private buildStartConfig(options: StartOptions): AgentConfig {
    const base = this.configManager.getConfig();

    return {
      server: {
        host: options.host ?? base.server.host,
        port: options.port ? parsePositiveInt(options.port, 'port') : base.server.port
      },
      emulator: {
        ...base.emulator,
        processName: options.processName ?? base.emulator.processName,
        statusFile: options.statusFile ?? base.emulator.statusFile
      },
      supervisor: {
        pollIntervalMs: options.pollInterval
          ? parsePositiveInt(options.pollInterval, 'poll interval')
          : base.supervisor.pollIntervalMs,
        probeTimeoutMs: options.probeTimeout
          ? parsePositiveInt(options.probeTimeout, 'probe timeout')
          : base.supervisor.probeTimeoutMs
      },
      developer: { ...base.developer, logLevel: this.logger.getLogLevel() }
    };
  }

  private client(options: RemoteOptions): AgentClient {
    return this.clientFactory(options.url ?? this.defaultUrl());
  }

  private defaultUrl(): string {
    const { host, port } = this.configManager.getConfig().server;
    const target = host === '0.0.0.0' || host === '::' ? '127.0.0.1' : host;
    return `http://${target}:${port}`;
  }

  private printStatus(status: StatusPayload, options: RemoteOptions): void {
    if (options.json) {
      console.log(JSON.stringify(status, null, 2));
    } else {
      this.outputFormatter.displayStatus(status);
    }
  }
}
