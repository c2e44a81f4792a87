import { cpus, freemem, loadavg, totalmem, CpuInfo } from 'os';
import { SystemStats } from '../interfaces/common';

interface CpuSample {
  idle: number;
  total: number;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function sampleCpus(info: CpuInfo[]): CpuSample {
  let idle = 0;
  let total = 0;
  for (const cpu of info) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

/**
 * Host CPU and memory figures reported alongside the emulator status.
 * CPU usage is measured between successive calls.
 */
export class SystemMonitor {
  private previous: CpuSample | null = null;

  getSystemStats(): SystemStats {
    return {
      cpuUsage: this.cpuUsage(),
      memoryUsage: this.memoryUsage(),
      loadAverage: this.loadAverage()
    };
  }

  private cpuUsage(): number | null {
    const info = cpus();
    if (info.length === 0) {
      return null;
    }

    const current = sampleCpus(info);
    const previous = this.previous;
    this.previous = current;

    const base = previous ?? { idle: 0, total: 0 };
    const total = current.total - base.total;
    if (total <= 0) {
      return null;
    }
    return round1(((total - (current.idle - base.idle)) / total) * 100);
  }

  private memoryUsage(): number | null {
    const total = totalmem();
    if (total <= 0) {
      return null;
    }
    return round1(((total - freemem()) / total) * 100);
  }

  private loadAverage(): number | null {
    const [oneMinute] = loadavg();
    // Windows always reports zeros
    return process.platform === 'win32' ? null : round1(oneMinute);
  }
}
