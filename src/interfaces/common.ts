/**
 * Common types and interfaces used across the agent
 */

export type OperatingMode = 'REAL' | 'SIMULATED';

export const OPERATING_MODES: readonly OperatingMode[] = ['REAL', 'SIMULATED'];

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export type AgentErrorKind = 'InvalidInput' | 'InvalidOperation' | 'ProbeUnavailable';

/**
 * A fresh reading returned by a backend. Backends never see the canonical state.
 */
export interface EmulatorReading {
  running: boolean;
  currentDemo: string | null;
  pid?: number | null;
  process?: ProcessStats | null;
}

/**
 * Resource usage of the emulator process itself, as sampled by `ps`
 */
export interface ProcessStats {
  pid: number;
  cpuPercent: number;
  memoryPercent: number;
}

/**
 * Canonical snapshot owned by the state supervisor.
 * Instances are frozen; a refresh replaces the whole object.
 */
export interface EmulatorState {
  running: boolean;
  currentDemo: string | null;
  lastUpdated: string; // ISO-8601
  mode: OperatingMode;
  runningSince: string | null;
  pid: number | null;
  process: ProcessStats | null;
}

export interface SystemStats {
  cpuUsage: number | null; // percent
  memoryUsage: number | null; // percent
  loadAverage: number | null; // 1 minute
}

/**
 * Status as served over HTTP and pushed to WebSocket subscribers
 */
export interface StatusPayload {
  running: boolean;
  currentDemo: string | null;
  mode: OperatingMode;
  lastUpdated: string;
  uptime: number; // seconds
  pid: number | null;
  process: ProcessStats | null;
  systemStats: SystemStats;
}

export function isOperatingMode(value: unknown): value is OperatingMode {
  return typeof value === 'string' && (OPERATING_MODES as readonly string[]).includes(value);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}
