import { EmulatorBackend } from '../interfaces/emulator-backend';
import { EmulatorReading } from '../interfaces/common';

/**
 * In-memory stand-in for the real emulator, used for development.
 * Stores exactly what it is given; the supervisor enforces the idle invariant.
 */
export class SimulatedBackend implements EmulatorBackend {
  private running = false;
  private currentDemo: string | null = null;

  async probe(): Promise<EmulatorReading> {
    return { running: this.running, currentDemo: this.currentDemo, pid: null, process: null };
  }

  applyDevState(running: boolean, demo: string | null): void {
    this.running = running;
    this.currentDemo = demo;
  }

  reset(): void {
    this.applyDevState(false, null);
  }
}
