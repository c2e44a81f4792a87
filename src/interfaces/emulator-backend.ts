import { EmulatorReading } from './common';

/**
 * Query surface shared by the process probe and the simulated backend.
 * The supervisor picks which one to consult; callers never do.
 */
export interface EmulatorBackend {
  /**
   * Take a fresh reading of the emulator
   */
  probe(): Promise<EmulatorReading>;
}
