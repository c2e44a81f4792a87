import { EmulatorStateSupervisor } from '../state-supervisor';
import { SimulatedBackend } from '../../emulator/simulated-backend';
import { AgentError } from '../../errors/agent-error';
import { EmulatorState } from '../../interfaces/common';
import {
  ControlledBackend,
  ManualClock,
  MockLogger,
  StubBackend,
  createMockLogger,
  flushPromises
} from '../../test/fakes';

const T0 = '2024-05-01T12:00:00.000Z';

describe('EmulatorStateSupervisor', () => {
  let clock: ManualClock;
  let logger: MockLogger;
  let simulatedBackend: SimulatedBackend;

  beforeEach(() => {
    clock = new ManualClock();
    logger = createMockLogger();
    simulatedBackend = new SimulatedBackend();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  function createSupervisor(
    processProbe: StubBackend | ControlledBackend,
    options: { pollIntervalMs?: number; probeTimeoutMs?: number } = {}
  ): EmulatorStateSupervisor {
    return new EmulatorStateSupervisor({
      processProbe,
      simulatedBackend,
      logger,
      clock: clock.read,
      ...options
    });
  }

  describe('initial state', () => {
    it('should start idle in REAL mode', () => {
      const supervisor = createSupervisor(new StubBackend());

      expect(supervisor.getStatus()).toEqual({
        running: false,
        currentDemo: null,
        lastUpdated: T0,
        mode: 'REAL',
        runningSince: null,
        pid: null,
        process: null
      });
      expect(supervisor.getMode()).toBe('REAL');
    });

    it('should hand out a frozen snapshot', () => {
      const supervisor = createSupervisor(new StubBackend());

      expect(Object.isFrozen(supervisor.getStatus())).toBe(true);
    });
  });

  describe('reconcile', () => {
    it('should fold a real process reading into the state', async () => {
      const probe = new StubBackend();
      probe.reading = {
        running: true,
        currentDemo: 'giana.d64',
        pid: 412,
        process: { pid: 412, cpuPercent: 48.5, memoryPercent: 1.2 }
      };
      const supervisor = createSupervisor(probe);
      clock.advance(1000);

      const state = await supervisor.reconcile();

      expect(state).toEqual({
        running: true,
        currentDemo: 'giana.d64',
        lastUpdated: '2024-05-01T12:00:01.000Z',
        mode: 'REAL',
        runningSince: '2024-05-01T12:00:01.000Z',
        pid: 412,
        process: { pid: 412, cpuPercent: 48.5, memoryPercent: 1.2 }
      });
      expect(supervisor.getStatus()).toBe(state);
    });

    it('should replace the snapshot instead of mutating it', async () => {
      const probe = new StubBackend();
      const supervisor = createSupervisor(probe);
      const before = supervisor.getStatus();

      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      await supervisor.reconcile();

      expect(before.running).toBe(false);
      expect(supervisor.getStatus()).not.toBe(before);
    });

    it('should keep runningSince while the same process keeps running', async () => {
      const probe = new StubBackend();
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      const supervisor = createSupervisor(probe);

      await supervisor.reconcile();
      clock.advance(5000);
      const state = await supervisor.reconcile();

      expect(state.runningSince).toBe(T0);
      expect(state.lastUpdated).toBe('2024-05-01T12:00:05.000Z');
    });

    it('should restart runningSince when the process is replaced', async () => {
      const probe = new StubBackend();
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      const supervisor = createSupervisor(probe);

      await supervisor.reconcile();
      clock.advance(5000);
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 413 };
      const state = await supervisor.reconcile();

      expect(state.runningSince).toBe('2024-05-01T12:00:05.000Z');
    });

    it('should refresh process usage without reporting a status change', async () => {
      const backend = new StubBackend();
      backend.reading = {
        running: true,
        currentDemo: 'giana.d64',
        pid: 412,
        process: { pid: 412, cpuPercent: 10, memoryPercent: 1 }
      };
      const supervisor = createSupervisor(backend);
      await supervisor.reconcile();
      const statusChanged = jest.fn();
      supervisor.on('statusChanged', statusChanged);

      backend.reading = { ...backend.reading, process: { pid: 412, cpuPercent: 55, memoryPercent: 1.5 } };
      const state = await supervisor.reconcile();

      expect(state.process).toEqual({ pid: 412, cpuPercent: 55, memoryPercent: 1.5 });
      expect(Object.isFrozen(state.process)).toBe(true);
      expect(statusChanged).not.toHaveBeenCalled();
    });

    it('should drop process usage when the emulator stops', async () => {
      const backend = new StubBackend();
      backend.reading = {
        running: false,
        currentDemo: null,
        pid: 412,
        process: { pid: 412, cpuPercent: 10, memoryPercent: 1 }
      };
      const supervisor = createSupervisor(backend);

      await expect(supervisor.reconcile()).resolves.toMatchObject({ running: false, pid: null, process: null });
    });

    it('should clear the demo, pid and runningSince when the emulator stops', async () => {
      const probe = new StubBackend();
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      const supervisor = createSupervisor(probe);
      await supervisor.reconcile();

      probe.reading = { running: false, currentDemo: 'giana.d64', pid: 412 };
      const state = await supervisor.reconcile();

      expect(state).toMatchObject({ running: false, currentDemo: null, runningSince: null, pid: null });
    });

    it('should keep lastUpdated monotonic when the clock steps back', async () => {
      const supervisor = createSupervisor(new StubBackend());
      clock.advance(10000);
      const first = await supervisor.reconcile();

      clock.advance(-60000);
      const second = await supervisor.reconcile();

      expect(first.lastUpdated).toBe('2024-05-01T12:00:10.000Z');
      expect(second.lastUpdated).toBe('2024-05-01T12:00:10.000Z');
    });

    it('should be idempotent when nothing changed', async () => {
      const probe = new StubBackend();
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      const supervisor = createSupervisor(probe);

      const first = await supervisor.reconcile();
      const second = await supervisor.reconcile();

      expect(second).toEqual(first);
    });

    it('should coalesce concurrent calls into one probe', async () => {
      const probe = new ControlledBackend();
      const supervisor = createSupervisor(probe);

      const first = supervisor.reconcile();
      const second = supervisor.reconcile();
      await flushPromises();

      expect(second).toBe(first);
      expect(probe.probeCount).toBe(1);

      probe.resolveNext({ running: true, currentDemo: 'giana.d64', pid: 412 });
      await expect(first).resolves.toMatchObject({ running: true, currentDemo: 'giana.d64' });

      const third = supervisor.reconcile();
      await flushPromises();
      expect(third).not.toBe(first);
      expect(probe.probeCount).toBe(2);
      probe.resolveNext({ running: false, currentDemo: null });
      await expect(third).resolves.toMatchObject({ running: false });
    });

    it('should serve the previous snapshot to readers until the backend answers', async () => {
      const backend = new ControlledBackend();
      const supervisor = createSupervisor(backend);
      const before = supervisor.getStatus();

      const pending = supervisor.reconcile();
      await flushPromises();
      for (let i = 0; i < 100; i++) {
        expect(supervisor.getStatus()).toBe(before);
      }

      backend.resolveNext({ running: true, currentDemo: 'giana.d64', pid: 412 });
      const after = await pending;

      expect(after).not.toBe(before);
      expect(supervisor.getStatus()).toBe(after);
      expect(after).toMatchObject({ running: true, currentDemo: 'giana.d64', pid: 412 });
    });

    it('should read a failing probe as not running', async () => {
      const probe = new ControlledBackend();
      const supervisor = createSupervisor(probe);
      const unavailable = jest.fn();
      supervisor.on('probeUnavailable', unavailable);

      const result = supervisor.reconcile();
      await flushPromises();
      probe.rejectNext(new Error('process table unavailable'));

      await expect(result).resolves.toMatchObject({ running: false, currentDemo: null, pid: null });
      expect(logger.warn).toHaveBeenCalledWith('ProbeUnavailable: process table unavailable', {
        mode: 'REAL',
        code: 'PROBE_FAILED'
      });
      expect(unavailable).toHaveBeenCalledTimes(1);
      const [error] = unavailable.mock.calls[0];
      expect(error).toBeInstanceOf(AgentError);
      expect(error).toMatchObject({ kind: 'ProbeUnavailable', code: 'PROBE_FAILED' });
    });

    it('should read a probe that does not answer in time as not running', async () => {
      jest.useFakeTimers();
      const slow = new ControlledBackend();
      const supervisor = createSupervisor(slow, { probeTimeoutMs: 100 });
      const unavailable = jest.fn();
      supervisor.on('probeUnavailable', unavailable);

      const result = supervisor.reconcile();
      await flushPromises();
      jest.advanceTimersByTime(100);

      await expect(result).resolves.toMatchObject({ running: false, currentDemo: null });
      expect(unavailable.mock.calls[0][0]).toMatchObject({
        code: 'PROBE_TIMEOUT',
        message: 'Probe did not answer within 100ms'
      });
    });
  });

  describe('setMode', () => {
    it('should switch to SIMULATED and reconcile against the simulated backend', async () => {
      const probe = new StubBackend();
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      const supervisor = createSupervisor(probe);
      await supervisor.reconcile();

      const state = await supervisor.setMode('SIMULATED');

      expect(state).toMatchObject({ running: false, currentDemo: null, mode: 'SIMULATED', pid: null });
      expect(supervisor.getMode()).toBe('SIMULATED');
      expect(probe.probeCount).toBe(1);
    });

    it('should re-sync without a mode change when the mode is unchanged', async () => {
      const probe = new StubBackend();
      const supervisor = createSupervisor(probe);
      const modeChanged = jest.fn();
      supervisor.on('modeChanged', modeChanged);

      const state = await supervisor.setMode('REAL');

      expect(state.mode).toBe('REAL');
      expect(probe.probeCount).toBe(1);
      expect(modeChanged).not.toHaveBeenCalled();
    });

    it('should emit modeChanged and log the transition', async () => {
      const supervisor = createSupervisor(new StubBackend());
      const modeChanged = jest.fn();
      supervisor.on('modeChanged', modeChanged);

      await supervisor.setMode('SIMULATED');

      expect(modeChanged).toHaveBeenCalledWith('SIMULATED', 'REAL');
      expect(logger.info).toHaveBeenCalledWith('Operating mode changed: REAL -> SIMULATED');
    });

    it('should keep the simulated state when SIMULATED is set again', async () => {
      const supervisor = createSupervisor(new StubBackend());
      await supervisor.setMode('SIMULATED');
      await supervisor.setDevState(true, 'Wizball');

      const state = await supervisor.setMode('SIMULATED');

      expect(state).toMatchObject({ running: true, currentDemo: 'Wizball' });
    });

    it('should reset the simulated backend when entering SIMULATED again', async () => {
      const supervisor = createSupervisor(new StubBackend());
      await supervisor.setMode('SIMULATED');
      await supervisor.setDevState(true, 'Wizball');
      await supervisor.setMode('REAL');

      const state = await supervisor.setMode('SIMULATED');

      expect(state).toMatchObject({ running: false, currentDemo: null, mode: 'SIMULATED' });
    });
  });

  describe('setDevState', () => {
    it('should apply the simulated state in SIMULATED mode', async () => {
      const supervisor = createSupervisor(new StubBackend());
      await supervisor.setMode('SIMULATED');
      clock.advance(2000);

      const state = await supervisor.setDevState(true, 'Wizball');

      expect(state).toEqual({
        running: true,
        currentDemo: 'Wizball',
        lastUpdated: '2024-05-01T12:00:02.000Z',
        mode: 'SIMULATED',
        runningSince: '2024-05-01T12:00:02.000Z',
        pid: null,
        process: null
      });
    });

    it('should drop the demo when not running', async () => {
      const supervisor = createSupervisor(new StubBackend());
      await supervisor.setMode('SIMULATED');

      const state = await supervisor.setDevState(false, 'Wizball');

      expect(state).toMatchObject({ running: false, currentDemo: null });
    });

    it('should trim the demo and treat a blank one as none', async () => {
      const supervisor = createSupervisor(new StubBackend());
      await supervisor.setMode('SIMULATED');

      expect((await supervisor.setDevState(true, '  Wizball ')).currentDemo).toBe('Wizball');
      expect((await supervisor.setDevState(true, '   ')).currentDemo).toBeNull();
    });

    it('should reject in REAL mode without touching the state', async () => {
      const supervisor = createSupervisor(new StubBackend());
      const before = supervisor.getStatus();

      await expect(supervisor.setDevState(true, 'Wizball')).rejects.toMatchObject({
        kind: 'InvalidOperation',
        code: 'MODE_MISMATCH',
        message: 'Must be in SIMULATED mode to set state directly'
      });
      expect(supervisor.getStatus()).toBe(before);
    });

    it('should keep serving requests after a rejected command', async () => {
      const probe = new StubBackend();
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      const supervisor = createSupervisor(probe);

      await expect(supervisor.setDevState(true, 'Wizball')).rejects.toBeInstanceOf(AgentError);

      await expect(supervisor.reconcile()).resolves.toMatchObject({ running: true, currentDemo: 'giana.d64' });
    });
  });

  describe('concurrency', () => {
    it('should queue a mode switch behind an in-flight probe', async () => {
      const probe = new ControlledBackend();
      const supervisor = createSupervisor(probe);
      const snapshots: EmulatorState[] = [];
      supervisor.on('reconciled', (state: EmulatorState) => snapshots.push(state));

      const refresh = supervisor.reconcile();
      const modeSwitch = supervisor.setMode('SIMULATED');
      await flushPromises();

      expect(supervisor.getMode()).toBe('REAL');
      expect(supervisor.reconcile()).toBe(refresh);

      probe.resolveNext({ running: true, currentDemo: 'giana.d64', pid: 412 });

      await expect(refresh).resolves.toMatchObject({ mode: 'REAL', running: true, currentDemo: 'giana.d64' });
      await expect(modeSwitch).resolves.toMatchObject({ mode: 'SIMULATED', running: false, pid: null });
      expect(snapshots.map(state => [state.mode, state.currentDemo])).toEqual([
        ['REAL', 'giana.d64'],
        ['SIMULATED', null]
      ]);
    });

    it('should never stamp a real reading with SIMULATED mode', async () => {
      const probe = new StubBackend();
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      const supervisor = createSupervisor(probe);
      const snapshots: EmulatorState[] = [];
      supervisor.on('reconciled', (state: EmulatorState) => snapshots.push(state));

      await Promise.all([
        supervisor.reconcile(),
        supervisor.setMode('SIMULATED'),
        supervisor.setDevState(true, 'Wizball'),
        supervisor.reconcile(),
        supervisor.setMode('REAL'),
        supervisor.reconcile()
      ]);

      for (const state of snapshots) {
        if (state.mode === 'SIMULATED') {
          expect(state.pid).toBeNull();
          expect(state.currentDemo).not.toBe('giana.d64');
        } else {
          expect(state.currentDemo).not.toBe('Wizball');
        }
      }
      expect(supervisor.getStatus()).toMatchObject({ mode: 'REAL', currentDemo: 'giana.d64', pid: 412 });
    });
  });

  describe('events', () => {
    it('should emit statusChanged only when the status changes', async () => {
      const probe = new StubBackend();
      const supervisor = createSupervisor(probe);
      const reconciled = jest.fn();
      const statusChanged = jest.fn();
      supervisor.on('reconciled', reconciled);
      supervisor.on('statusChanged', statusChanged);

      await supervisor.reconcile();
      probe.reading = { running: true, currentDemo: 'giana.d64', pid: 412 };
      const running = await supervisor.reconcile();
      await supervisor.reconcile();

      expect(reconciled).toHaveBeenCalledTimes(3);
      expect(statusChanged).toHaveBeenCalledTimes(1);
      expect(statusChanged.mock.calls[0][0]).toBe(running);
      expect(statusChanged.mock.calls[0][1]).toMatchObject({ running: false });
    });
  });

  describe('start and stop', () => {
    it('should reconcile immediately and then on every interval', async () => {
      jest.useFakeTimers();
      const probe = new StubBackend();
      const supervisor = createSupervisor(probe, { pollIntervalMs: 1000 });

      supervisor.start();
      await flushPromises();
      expect(probe.probeCount).toBe(1);
      expect(supervisor.isRunning()).toBe(true);

      jest.advanceTimersByTime(1000);
      await flushPromises();
      expect(probe.probeCount).toBe(2);

      await supervisor.stop();
      jest.advanceTimersByTime(5000);
      await flushPromises();
      expect(probe.probeCount).toBe(2);
      expect(supervisor.isRunning()).toBe(false);
    });

    it('should not start a second loop', async () => {
      jest.useFakeTimers();
      const probe = new StubBackend();
      const supervisor = createSupervisor(probe, { pollIntervalMs: 1000 });

      supervisor.start();
      supervisor.start();
      await flushPromises();
      jest.advanceTimersByTime(1000);
      await flushPromises();

      expect(probe.probeCount).toBe(2);
      await supervisor.stop();
    });

    it('should wait for the in-flight reconciliation when stopping', async () => {
      const probe = new ControlledBackend();
      const supervisor = createSupervisor(probe, { pollIntervalMs: 60000 });
      let stopped = false;

      supervisor.start();
      await flushPromises();
      const stopping = supervisor.stop().then(() => {
        stopped = true;
      });
      await flushPromises();
      expect(stopped).toBe(false);

      probe.resolveNext({ running: true, currentDemo: 'giana.d64', pid: 412 });
      await stopping;

      expect(stopped).toBe(true);
      expect(supervisor.getStatus().running).toBe(true);
    });

    it('should allow stop to be called twice', async () => {
      const supervisor = createSupervisor(new StubBackend());

      await supervisor.stop();
      await expect(supervisor.stop()).resolves.toBeUndefined();
    });
  });
});
