/**
 * Retro emulator agent
 *
 * Library entry point: the supervisor, its backends, the HTTP/WebSocket
 * boundary and the client used to talk to a running agent.
 */

export * from './interfaces';
export * from './errors';
export * from './emulator';
export * from './supervisor';
export * from './server';
export { ConsoleLogger, Logger, silentLogger } from './logging/logger';
export { AgentClient, AgentClientError, statusPayloadSchema } from './client/agent-client';
export {
  ConfigManager,
  AgentConfig,
  PartialAgentConfig,
  DEFAULT_CONFIG_FILE,
  assertValidConfig,
  applyEnvOverrides
} from './cli/config-manager';
export { createAgent, Agent, CreateAgentOptions } from './agent';
