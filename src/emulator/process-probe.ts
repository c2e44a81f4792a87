import { promises as fs } from 'fs';
import { EmulatorBackend } from '../interfaces/emulator-backend';
import { EmulatorReading, ProcessStats } from '../interfaces/common';
import { Logger, silentLogger } from '../logging/logger';
import { errorMessage } from '../errors/agent-error';
import { CommandRunner, runCommand } from './command-runner';

/**
 * How the real emulator is identified on this host
 */
export interface ProcessProbeConfig {
  processName: string;
  statusFile?: string | null;
  programExtensions?: string[];
  listTimeoutMs?: number;
}

/**
 * One line of the OS process table. `command` is the full command line,
 * unsplit: paths on it may contain spaces.
 */
export interface ProcessEntry {
  pid: number;
  cpuPercent: number;
  memoryPercent: number;
  command: string;
}

/**
 * Status file outcome: `null` when absent, stale or malformed
 */
type StatusFileDemo = { demo: string | null } | null;

/**
 * Contents of the side-channel file a launcher writes next to the emulator
 */
export interface LauncherStatus {
  demo: string | null;
  pid?: number;
}

export const DEFAULT_PROGRAM_EXTENSIONS = ['.prg', '.d64', '.d71', '.d81', '.g64', '.t64', '.tap', '.crt', '.p00'];

const PS_FORMAT = 'pid=,pcpu=,pmem=,args=';

const NOT_RUNNING: EmulatorReading = { running: false, currentDemo: null, pid: null, process: null };

const PROCESS_LINE = /^\s*(\d+)\s+(\d+(?:[.,]\d+)?)\s+(\d+(?:[.,]\d+)?)\s+(.+)$/;

function parsePercent(value: string): number {
  return parseFloat(value.replace(',', '.'));
}

/**
 * Parse `ps -A -o pid=,pcpu=,pmem=,args=` output
 */
export function parseProcessTable(output: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];

  for (const line of output.split('\n')) {
    const match = PROCESS_LINE.exec(line);
    if (!match) continue;

    entries.push({
      pid: parseInt(match[1], 10),
      cpuPercent: parsePercent(match[2]),
      memoryPercent: parsePercent(match[3]),
      command: match[4].trim()
    });
  }

  return entries;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizeExecutable(executable: string): string {
  const name = executable.slice(Math.max(executable.lastIndexOf('/'), executable.lastIndexOf('\\')) + 1);
  return name.toLowerCase().replace(/\.exe$/, '');
}

/**
 * File name of a program path that ends at the end of `text`.
 * Spaces inside the path are kept; an option flag before it is not.
 */
function programName(text: string): string | null {
  const afterSeparator = text.slice(Math.max(text.lastIndexOf('/'), text.lastIndexOf('\\')) + 1);
  const name = afterSeparator.replace(/^[\s\S]*(?:^|\s)-\S*\s+/, '').trim();
  return name.length > 0 ? name : null;
}

/**
 * Queries the operating system for the real emulator process.
 * Read-only; holds no state between probes.
 */
export class ProcessProbe implements EmulatorBackend {
  private readonly processName: string;
  private readonly executablePattern: RegExp;
  private readonly programPattern: RegExp | null;
  private readonly statusFile: string | null;
  private readonly listTimeoutMs: number;

  constructor(
    config: ProcessProbeConfig,
    private readonly logger: Logger = silentLogger,
    private readonly run: CommandRunner = runCommand
  ) {
    this.processName = normalizeExecutable(config.processName);
    this.executablePattern = new RegExp(`(?:^|[\\\\/])${escapeRegExp(this.processName)}(?:\\.exe)?(?=\\s|$)`, 'i');
    const extensions = (config.programExtensions ?? DEFAULT_PROGRAM_EXTENSIONS).map(escapeRegExp);
    this.programPattern = extensions.length > 0 ? new RegExp(`(?:${extensions.join('|')})(?=\\s|$)`, 'gi') : null;
    this.statusFile = config.statusFile ?? null;
    this.listTimeoutMs = config.listTimeoutMs ?? 2000;
  }

  async probe(): Promise<EmulatorReading> {
    let entries: ProcessEntry[];
    try {
      entries = await this.listProcesses();
    } catch (error) {
      this.logger.warn('ProbeUnavailable: could not list processes', {
        processName: this.processName,
        error: errorMessage(error)
      });
      return NOT_RUNNING;
    }

    for (const entry of entries) {
      const match = this.executablePattern.exec(entry.command);
      if (!match) continue;

      const args = entry.command.slice(match.index + match[0].length);
      const fromFile = await this.demoFromStatusFile(entry.pid);
      const currentDemo = fromFile ? fromFile.demo : this.demoFromArgs(args);
      const stats: ProcessStats = {
        pid: entry.pid,
        cpuPercent: entry.cpuPercent,
        memoryPercent: entry.memoryPercent
      };
      this.logger.debug('Emulator process found', { ...stats, currentDemo });

      return { running: true, currentDemo, pid: entry.pid, process: stats };
    }

    return NOT_RUNNING;
  }

  private async listProcesses(): Promise<ProcessEntry[]> {
    const result = await this.run('ps', ['-A', '-o', PS_FORMAT], { timeout: this.listTimeoutMs });
    if (result.exitCode !== 0) {
      throw new Error(`ps exited with code ${result.exitCode}: ${result.stderr}`);
    }
    return parseProcessTable(result.stdout);
  }

  /**
   * Demo named by the launcher's status file, if the file belongs to this process
   */
  private async demoFromStatusFile(pid: number): Promise<StatusFileDemo> {
    if (!this.statusFile) {
      return null;
    }

    try {
      const content = await fs.readFile(this.statusFile, 'utf-8');
      const status = parseLauncherStatus(JSON.parse(content));
      if (!status) {
        this.logger.debug('Ignoring malformed status file', { statusFile: this.statusFile });
        return null;
      }
      if (status.pid !== undefined && status.pid !== pid) {
        this.logger.debug('Ignoring stale status file', { statusFile: this.statusFile, filePid: status.pid, pid });
        return null;
      }
      return { demo: status.demo };
    } catch (error) {
      this.logger.debug('Status file unreadable', { statusFile: this.statusFile, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Last argument that looks like a program or disk image
   */
  private demoFromArgs(args: string): string | null {
    if (!this.programPattern) {
      return null;
    }
    let end = -1;
    for (const match of args.matchAll(this.programPattern)) {
      end = (match.index ?? 0) + match[0].length;
    }
    return end < 0 ? null : programName(args.slice(0, end));
  }
}

export function parseLauncherStatus(value: unknown): LauncherStatus | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }

  const rawDemo: unknown = Reflect.get(value, 'demo');
  const rawPid: unknown = Reflect.get(value, 'pid');

  let demo: string | null;
  if (rawDemo === null || rawDemo === undefined) {
    demo = null;
  } else if (typeof rawDemo === 'string' && rawDemo.trim().length > 0) {
    demo = rawDemo.trim();
  } else {
    return null;
  }

  if (rawPid === undefined) {
    return { demo };
  }
  if (typeof rawPid !== 'number' || !Number.isInteger(rawPid)) {
    return null;
  }
  return { demo, pid: rawPid };
}
