import { Hono } from 'hono';
import { EmulatorState, StatusPayload } from './interfaces/common';
import { ProcessProbe } from './emulator/process-probe';
import { SimulatedBackend } from './emulator/simulated-backend';
import { SystemMonitor } from './emulator/system-monitor';
import { CommandRunner } from './emulator/command-runner';
import { EmulatorStateSupervisor } from './supervisor/state-supervisor';
import { toStatusPayload } from './supervisor/status-payload';
import { StatusBroadcaster } from './server/status-broadcaster';
import { createAgentApp } from './server/http-app';
import { AgentServer } from './server/agent-server';
import { AgentConfig } from './cli/config-manager';
import { ConsoleLogger } from './logging/logger';

export interface Agent {
  supervisor: EmulatorStateSupervisor;
  simulatedBackend: SimulatedBackend;
  broadcaster: StatusBroadcaster;
  app: Hono;
  server: AgentServer;
  describeStatus(state: EmulatorState): StatusPayload;
}

export interface CreateAgentOptions {
  logger?: ConsoleLogger;
  runCommand?: CommandRunner;
  clock?: () => number;
}

/**
 * Wire the backends, supervisor, broadcaster and HTTP boundary from configuration
 */
export function createAgent(config: AgentConfig, options: CreateAgentOptions = {}): Agent {
  const logger = options.logger ?? new ConsoleLogger(config.developer.logLevel);
  const clock = options.clock ?? Date.now;

  const processProbe = new ProcessProbe(
    {
      processName: config.emulator.processName,
      statusFile: config.emulator.statusFile,
      programExtensions: config.emulator.programExtensions,
      listTimeoutMs: config.supervisor.probeTimeoutMs
    },
    logger.child('probe'),
    options.runCommand
  );
  const simulatedBackend = new SimulatedBackend();
  const systemMonitor = new SystemMonitor();

  const supervisor = new EmulatorStateSupervisor({
    processProbe,
    simulatedBackend,
    pollIntervalMs: config.supervisor.pollIntervalMs,
    probeTimeoutMs: config.supervisor.probeTimeoutMs,
    logger: logger.child('supervisor'),
    clock
  });

  const describeStatus = (state: EmulatorState): StatusPayload =>
    toStatusPayload(state, systemMonitor.getSystemStats(), clock());

  const broadcaster = new StatusBroadcaster(() => describeStatus(supervisor.getStatus()), logger.child('ws'), clock);
  broadcaster.attach(supervisor);

  const app = createAgentApp({ supervisor, describeStatus, broadcaster, logger: logger.child('http'), clock });
  const server = new AgentServer({
    host: config.server.host,
    port: config.server.port,
    app,
    supervisor,
    broadcaster,
    logger: logger.child('server')
  });

  return { supervisor, simulatedBackend, broadcaster, app, server, describeStatus };
}
