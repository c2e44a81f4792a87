/**
 * Emulator backends
 *
 * The process probe observes the real emulator through the OS process table;
 * the simulated backend stands in for it during development.
 */

export { CommandResult, CommandOptions, CommandRunner, runCommand } from './command-runner';
export {
  ProcessProbe,
  ProcessProbeConfig,
  ProcessEntry,
  LauncherStatus,
  DEFAULT_PROGRAM_EXTENSIONS,
  parseProcessTable,
  parseLauncherStatus
} from './process-probe';
export { SimulatedBackend } from './simulated-backend';
export { SystemMonitor } from './system-monitor';
