import { EmulatorState, StatusPayload, SystemStats } from '../interfaces/common';

/**
 * Whole seconds since the run began, 0 when idle
 */
export function uptimeSeconds(state: EmulatorState, now: number = Date.now()): number {
  if (!state.running || !state.runningSince) {
    return 0;
  }
  return Math.max(0, Math.floor((now - Date.parse(state.runningSince)) / 1000));
}

export function toStatusPayload(state: EmulatorState, systemStats: SystemStats, now: number = Date.now()): StatusPayload {
  return {
    running: state.running,
    currentDemo: state.currentDemo,
    mode: state.mode,
    lastUpdated: state.lastUpdated,
    uptime: uptimeSeconds(state, now),
    pid: state.pid,
    process: state.process,
    systemStats
  };
}
