/**
 * Configuration Manager - Handles loading, validation, and management of agent configuration
 */

import { promises as fs } from 'fs';
import { resolve } from 'path';
import { LogLevel, LOG_LEVELS, isLogLevel } from '../interfaces/common';
import { DEFAULT_PROGRAM_EXTENSIONS } from '../emulator/process-probe';
import { errorMessage } from '../errors/agent-error';

export interface AgentConfig {
  // Where the HTTP boundary listens
  server: {
    host: string;
    port: number;
  };

  // How the real emulator is recognised
  emulator: {
    processName: string;
    statusFile: string | null;
    programExtensions: string[];
  };

  // Reconciliation loop
  supervisor: {
    pollIntervalMs: number;
    probeTimeoutMs: number;
  };

  developer: {
    debug: boolean;
    logLevel: LogLevel;
  };
}

export type PartialAgentConfig = {
  [K in keyof AgentConfig]?: Partial<AgentConfig[K]>;
};

export interface ConfigInitOptions {
  force?: boolean;
  template?: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  error?: string;
}

export const DEFAULT_CONFIG_FILE = 'retro-agent.config.json';

/**
 * Default configuration templates
 */
const CONFIG_TEMPLATES: Record<string, AgentConfig> = {
  default: {
    server: {
      host: '0.0.0.0',
      port: 5000
    },
    emulator: {
      processName: 'x64sc',
      statusFile: null,
      programExtensions: [...DEFAULT_PROGRAM_EXTENSIONS]
    },
    supervisor: {
      pollIntervalMs: 2000,
      probeTimeoutMs: 3000
    },
    developer: {
      debug: false,
      logLevel: 'info'
    }
  },

  development: {
    server: {
      host: '127.0.0.1',
      port: 5000
    },
    emulator: {
      processName: 'x64sc',
      statusFile: '/tmp/retro-agent-status.json',
      programExtensions: [...DEFAULT_PROGRAM_EXTENSIONS]
    },
    supervisor: {
      pollIntervalMs: 1000,
      probeTimeoutMs: 2000
    },
    developer: {
      debug: true,
      logLevel: 'debug'
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isPort(value: unknown): value is number {
  return isPositiveInteger(value) && value <= 65535;
}

function section(config: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const value = config[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`${name} configuration must be an object`);
  }
  return value;
}

/**
 * Validate configuration object structure and values
 */
export function assertValidConfig(config: unknown): asserts config is PartialAgentConfig {
  if (!isRecord(config)) {
    throw new Error('Configuration must be an object');
  }

  const server = section(config, 'server');
  if (server) {
    if (server.host !== undefined && (typeof server.host !== 'string' || server.host.length === 0)) {
      throw new Error('server.host must be a non-empty string');
    }
    if (server.port !== undefined && !isPort(server.port)) {
      throw new Error('server.port must be an integer between 1 and 65535');
    }
  }

  const emulator = section(config, 'emulator');
  if (emulator) {
    if (emulator.processName !== undefined && (typeof emulator.processName !== 'string' || emulator.processName.length === 0)) {
      throw new Error('emulator.processName must be a non-empty string');
    }
    if (emulator.statusFile !== undefined && emulator.statusFile !== null && typeof emulator.statusFile !== 'string') {
      throw new Error('emulator.statusFile must be a string or null');
    }
    if (emulator.programExtensions !== undefined) {
      const extensions = emulator.programExtensions;
      if (!Array.isArray(extensions) || !extensions.every(ext => typeof ext === 'string' && ext.startsWith('.'))) {
        throw new Error('emulator.programExtensions must be an array of extensions starting with "."');
      }
    }
  }

  const supervisor = section(config, 'supervisor');
  if (supervisor) {
    if (supervisor.pollIntervalMs !== undefined && !isPositiveInteger(supervisor.pollIntervalMs)) {
      throw new Error('supervisor.pollIntervalMs must be a positive integer');
    }
    if (supervisor.probeTimeoutMs !== undefined && !isPositiveInteger(supervisor.probeTimeoutMs)) {
      throw new Error('supervisor.probeTimeoutMs must be a positive integer');
    }
  }

  const developer = section(config, 'developer');
  if (developer) {
    if (developer.debug !== undefined && typeof developer.debug !== 'boolean') {
      throw new Error('developer.debug must be a boolean');
    }
    if (developer.logLevel !== undefined && !isLogLevel(developer.logLevel)) {
      throw new Error(`developer.logLevel must be one of: ${LOG_LEVELS.join(', ')}`);
    }
  }
}

/**
 * Apply RETRO_AGENT_HOST, RETRO_AGENT_PORT and RETRO_AGENT_DEBUG
 */
export function applyEnvOverrides(config: AgentConfig, env: NodeJS.ProcessEnv): AgentConfig {
  const result: AgentConfig = {
    ...config,
    server: { ...config.server },
    developer: { ...config.developer }
  };

  if (env.RETRO_AGENT_HOST) {
    result.server.host = env.RETRO_AGENT_HOST;
  }

  if (env.RETRO_AGENT_PORT) {
    const port = Number(env.RETRO_AGENT_PORT);
    if (!isPort(port)) {
      throw new Error(`RETRO_AGENT_PORT must be an integer between 1 and 65535, got "${env.RETRO_AGENT_PORT}"`);
    }
    result.server.port = port;
  }

  if (env.RETRO_AGENT_DEBUG !== undefined) {
    const debug = env.RETRO_AGENT_DEBUG.toLowerCase() === 'true';
    result.developer.debug = debug;
    if (debug) {
      result.developer.logLevel = 'debug';
    }
  }

  return result;
}

/**
 * Manages configuration loading, validation, and persistence
 */
export class ConfigManager {
  private config: AgentConfig = CONFIG_TEMPLATES.default;
  private configPath = '';

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load configuration from file; a missing file means the default template
   */
  async loadConfig(configPath: string = DEFAULT_CONFIG_FILE): Promise<AgentConfig> {
    this.configPath = resolve(configPath);

    let fileConfig: PartialAgentConfig = {};
    try {
      await fs.access(this.configPath);
      const configContent = await fs.readFile(this.configPath, 'utf-8');
      const parsedConfig: unknown = JSON.parse(configContent);
      assertValidConfig(parsedConfig);
      fileConfig = parsedConfig;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        fileConfig = {};
      } else if (error instanceof SyntaxError) {
        throw new Error(`Invalid JSON in configuration file: ${this.configPath}`);
      } else {
        throw new Error(`Failed to load configuration: ${errorMessage(error)}`);
      }
    }

    this.config = applyEnvOverrides(this.mergeWithDefaults(fileConfig), this.env);
    return this.getConfig();
  }

  getConfig(): AgentConfig {
    return structuredClone(this.config);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Write a template to disk
   */
  async initializeConfig(configPath: string, options: ConfigInitOptions = {}): Promise<void> {
    const fullPath = resolve(configPath);

    try {
      if (!options.force) {
        let exists = true;
        try {
          await fs.access(fullPath);
        } catch (error) {
          if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
            throw error;
          }
          exists = false;
        }
        if (exists) {
          throw new Error(`Configuration file already exists: ${fullPath}. Use --force to overwrite.`);
        }
      }

      const template = options.template || 'default';
      const templateConfig = CONFIG_TEMPLATES[template];
      if (!templateConfig) {
        throw new Error(
          `Unknown configuration template: ${template}. Available templates: ${this.getAvailableTemplates().join(', ')}`
        );
      }

      await fs.writeFile(fullPath, JSON.stringify(templateConfig, null, 2), 'utf-8');

      this.config = structuredClone(templateConfig);
      this.configPath = fullPath;
    } catch (error) {
      throw new Error(`Failed to initialize configuration: ${errorMessage(error)}`);
    }
  }

  async validateConfig(configPath?: string): Promise<ConfigValidationResult> {
    const pathToValidate = configPath ? resolve(configPath) : this.configPath;

    try {
      const configContent = await fs.readFile(pathToValidate, 'utf-8');
      const parsedConfig: unknown = JSON.parse(configContent);
      assertValidConfig(parsedConfig);
      return { valid: true };
    } catch (error) {
      return { valid: false, error: errorMessage(error) };
    }
  }

  getAvailableTemplates(): string[] {
    return Object.keys(CONFIG_TEMPLATES);
  }

  getTemplate(templateName: string): AgentConfig | null {
    const template = CONFIG_TEMPLATES[templateName];
    return template ? structuredClone(template) : null;
  }

  private mergeWithDefaults(config: PartialAgentConfig): AgentConfig {
    const defaultConfig = CONFIG_TEMPLATES.default;

    return {
      server: { ...defaultConfig.server, ...config.server },
      emulator: { ...defaultConfig.emulator, ...config.emulator },
      supervisor: { ...defaultConfig.supervisor, ...config.supervisor },
      developer: { ...defaultConfig.developer, ...config.developer }
    };
  }
}
