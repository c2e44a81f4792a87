import { EventEmitter } from 'events';
import { StateSupervisor } from '../interfaces/state-supervisor';
import { EmulatorBackend } from '../interfaces/emulator-backend';
import { EmulatorReading, EmulatorState, OperatingMode, isOperatingMode } from '../interfaces/common';
import { SimulatedBackend } from '../emulator/simulated-backend';
import { Logger, silentLogger } from '../logging/logger';
import {
  AgentError,
  errorMessage,
  invalidInput,
  invalidOperation,
  isAgentError,
  probeUnavailable
} from '../errors/agent-error';

export interface StateSupervisorOptions {
  processProbe: EmulatorBackend;
  simulatedBackend: SimulatedBackend;
  pollIntervalMs?: number;
  probeTimeoutMs?: number;
  logger?: Logger;
  clock?: () => number;
}

export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_PROBE_TIMEOUT_MS = 3000;

const NOT_RUNNING: EmulatorReading = { running: false, currentDemo: null, pid: null, process: null };

function normalizeDemo(demo: string | null | undefined): string | null {
  if (demo === null || demo === undefined) {
    return null;
  }
  const trimmed = demo.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function statusDiffers(previous: EmulatorState, next: EmulatorState): boolean {
  return (
    previous.running !== next.running ||
    previous.currentDemo !== next.currentDemo ||
    previous.mode !== next.mode ||
    previous.pid !== next.pid
  );
}

/**
 * Owns the canonical emulator state.
 *
 * Every write (background tick, forced refresh, mode switch, dev-state command)
 * runs in one exclusive section, so at most one backend probe is in flight.
 * Concurrent `reconcile()` calls join the pending one. Readers get the current
 * frozen snapshot; a refresh swaps in a new object rather than editing fields.
 *
 * Events:
 * - `reconciled` (state) after every reconciliation
 * - `statusChanged` (state, previous) when running, demo, mode or pid changed
 * - `modeChanged` (mode, previous)
 * - `probeUnavailable` (error) when a backend failed or timed out
 */
export class EmulatorStateSupervisor extends EventEmitter implements StateSupervisor {
  private readonly processProbe: EmulatorBackend;
  private readonly simulatedBackend: SimulatedBackend;
  private readonly pollIntervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly logger: Logger;
  private readonly clock: () => number;

  private state: EmulatorState;
  private mode: OperatingMode = 'REAL';
  private lastStamp: number;
  private queue: Promise<void> = Promise.resolve();
  private pending: Promise<EmulatorState> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: StateSupervisorOptions) {
    super();
    this.processProbe = options.processProbe;
    this.simulatedBackend = options.simulatedBackend;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;

    this.lastStamp = this.clock();
    this.state = Object.freeze({
      running: false,
      currentDemo: null,
      lastUpdated: new Date(this.lastStamp).toISOString(),
      mode: this.mode,
      runningSince: null,
      pid: null,
      process: null
    });
  }

  getStatus(): EmulatorState {
    return this.state;
  }

  getMode(): OperatingMode {
    return this.mode;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  reconcile(): Promise<EmulatorState> {
    if (this.pending) {
      return this.pending;
    }

    const run = this.exclusive(() => this.refresh());
    this.pending = run;
    const clear = (): void => {
      if (this.pending === run) {
        this.pending = null;
      }
    };
    void run.then(clear, clear);
    return run;
  }

  setMode(mode: OperatingMode): Promise<EmulatorState> {
    if (!isOperatingMode(mode)) {
      return Promise.reject(invalidInput('INVALID_MODE', `Invalid mode: ${String(mode)}. Must be one of REAL, SIMULATED`));
    }

    return this.exclusive(async () => {
      const previous = this.mode;
      this.mode = mode;

      if (previous !== mode) {
        if (mode === 'SIMULATED') {
          this.simulatedBackend.reset();
        }
        this.logger.info(`Operating mode changed: ${previous} -> ${mode}`);
        this.emit('modeChanged', mode, previous);
      }

      return this.refresh();
    });
  }

  setDevState(running: boolean, demo: string | null): Promise<EmulatorState> {
    return this.exclusive(async () => {
      if (this.mode !== 'SIMULATED') {
        throw invalidOperation('MODE_MISMATCH', 'Must be in SIMULATED mode to set state directly', {
          mode: this.mode
        });
      }

      this.simulatedBackend.applyDevState(running, demo);
      this.logger.debug('Simulated state applied', { running, demo });
      return this.refresh();
    });
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.logger.info('Starting reconciliation loop', { pollIntervalMs: this.pollIntervalMs });
    this.timer = setInterval(() => this.tick(), this.pollIntervalMs);
    this.tick();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Reconciliation loop stopped');
    }

    // let in-flight work finish writing
    await this.queue;
  }

  private tick(): void {
    this.reconcile().catch((error: unknown) => {
      this.logger.error('Reconciliation failed', { error: errorMessage(error) });
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Read the active backend and swap in a new snapshot. Caller holds the exclusive section.
   */
  private async refresh(): Promise<EmulatorState> {
    const mode = this.mode;
    const backend = mode === 'REAL' ? this.processProbe : this.simulatedBackend;
    const reading = await this.readBackend(backend, mode);

    const previous = this.state;
    const running = reading.running;
    const pid = running ? reading.pid ?? null : null;
    const stats = running && reading.process ? Object.freeze({ ...reading.process }) : null;
    const lastUpdated = this.stamp();
    const continuing = previous.running && previous.mode === mode && previous.pid === pid;

    const next: EmulatorState = Object.freeze({
      running,
      currentDemo: running ? normalizeDemo(reading.currentDemo) : null,
      lastUpdated,
      mode,
      runningSince: running ? (continuing ? previous.runningSince : lastUpdated) : null,
      pid,
      process: stats
    });

    this.state = next;
    this.emit('reconciled', next);

    if (statusDiffers(previous, next)) {
      this.logger.info('Emulator status changed', {
        running: next.running,
        currentDemo: next.currentDemo,
        mode: next.mode
      });
      this.emit('statusChanged', next, previous);
    }

    return next;
  }

  /**
   * Probe with a bounded wait. Failure or timeout reads as "not running".
   */
  private async readBackend(backend: EmulatorBackend, mode: OperatingMode): Promise<EmulatorReading> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(probeUnavailable('PROBE_TIMEOUT', `Probe did not answer within ${this.probeTimeoutMs}ms`, { mode }));
      }, this.probeTimeoutMs);
    });

    try {
      return await Promise.race([backend.probe(), timeout]);
    } catch (error) {
      const failure: AgentError = isAgentError(error)
        ? error
        : probeUnavailable('PROBE_FAILED', errorMessage(error), { mode });
      this.logger.warn(`ProbeUnavailable: ${failure.message}`, { mode, code: failure.code });
      this.emit('probeUnavailable', failure);
      return NOT_RUNNING;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private stamp(): string {
    this.lastStamp = Math.max(this.clock(), this.lastStamp);
    return new Date(this.lastStamp).toISOString();
  }
}
