import { EmulatorState, OperatingMode } from './common';

/**
 * Interface for the emulator state supervisor
 * Owns the canonical emulator state and serializes every write to it
 */
export interface StateSupervisor {
  /**
   * Current canonical snapshot. Never waits on I/O.
   */
  getStatus(): EmulatorState;

  /**
   * Currently active operating mode
   */
  getMode(): OperatingMode;

  /**
   * Switch the active backend and reconcile against it before resolving
   */
  setMode(mode: OperatingMode): Promise<EmulatorState>;

  /**
   * Force the simulated backend's state. Only valid in SIMULATED mode.
   */
  setDevState(running: boolean, demo: string | null): Promise<EmulatorState>;

  /**
   * Refresh the canonical snapshot from the active backend
   */
  reconcile(): Promise<EmulatorState>;

  /**
   * Begin periodic reconciliation
   */
  start(): void;

  /**
   * Stop periodic reconciliation and wait for in-flight work
   */
  stop(): Promise<void>;
}
