/**
 * Output Formatter - Handles consistent formatting and display of CLI output
 */

import { OperatingMode, StatusPayload } from '../interfaces/common';
import { AgentConfig } from './config-manager';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m'
};

const MODE_COLORS: Record<OperatingMode, string> = {
  REAL: COLORS.cyan,
  SIMULATED: COLORS.magenta
};

/**
 * Format a duration in seconds as e.g. "1h 02m 05s"
 */
export function formatUptime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  const pad = (value: number): string => value.toString().padStart(2, '0');

  if (hours > 0) {
    return `${hours}h ${pad(minutes)}m ${pad(secs)}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${pad(secs)}s`;
  }
  return `${secs}s`;
}

/**
 * Handles formatting and display of CLI output
 */
export class OutputFormatter {
  private colorEnabled: boolean;

  constructor(colorEnabled: boolean = true) {
    this.colorEnabled = colorEnabled && process.stdout.isTTY === true;
  }

  setColorEnabled(enabled: boolean): void {
    this.colorEnabled = enabled && process.stdout.isTTY === true;
  }

  private colorize(text: string, color: string): string {
    return this.colorEnabled ? `${color}${text}${COLORS.reset}` : text;
  }

  success(message: string): void {
    console.log(this.colorize('✓ ', COLORS.green) + message);
  }

  error(message: string): void {
    console.error(this.colorize('✗ ', COLORS.red) + this.colorize(message, COLORS.red));
  }

  warn(message: string): void {
    console.warn(this.colorize('⚠ ', COLORS.yellow) + this.colorize(message, COLORS.yellow));
  }

  info(message: string): void {
    console.log(this.colorize('ℹ ', COLORS.blue) + message);
  }

  /**
   * Display the emulator status reported by an agent
   */
  displayStatus(status: StatusPayload): void {
    const state = status.running
      ? this.colorize('RUNNING', COLORS.green)
      : this.colorize('STOPPED', COLORS.gray);
    const stats = status.systemStats;

    console.log(`\n${this.colorize('Emulator Status:', COLORS.bright)}`);
    console.log(`  State:        ${state}`);
    console.log(`  Mode:         ${this.colorize(status.mode, MODE_COLORS[status.mode])}`);
    console.log(`  Demo:         ${status.currentDemo ?? '-'}`);
    console.log(`  PID:          ${status.pid ?? '-'}`);
    console.log(`  Uptime:       ${status.running ? formatUptime(status.uptime) : '-'}`);
    console.log(`  Last Updated: ${status.lastUpdated}`);
    console.log(`  Host CPU:     ${stats.cpuUsage === null ? '-' : `${stats.cpuUsage}%`}`);
    console.log(`  Host Memory:  ${stats.memoryUsage === null ? '-' : `${stats.memoryUsage}%`}`);
  }

  /**
   * Display configuration
   */
  displayConfig(config: AgentConfig): void {
    console.log(`\n${this.colorize('Current Configuration:', COLORS.bright)}`);
    console.log(this.colorize('─'.repeat(50), COLORS.gray));

    console.log(`\n${this.colorize('Server:', COLORS.yellow)}`);
    console.log(`  Host:        ${config.server.host}`);
    console.log(`  Port:        ${config.server.port}`);

    console.log(`\n${this.colorize('Emulator:', COLORS.yellow)}`);
    console.log(`  Process:     ${config.emulator.processName}`);
    console.log(`  Status File: ${config.emulator.statusFile ?? '-'}`);
    console.log(`  Programs:    ${config.emulator.programExtensions.join(' ')}`);

    console.log(`\n${this.colorize('Supervisor:', COLORS.yellow)}`);
    console.log(`  Poll Interval: ${config.supervisor.pollIntervalMs}ms`);
    console.log(`  Probe Timeout: ${config.supervisor.probeTimeoutMs}ms`);

    console.log(`\n${this.colorize('Developer:', COLORS.yellow)}`);
    console.log(`  Debug Mode:  ${config.developer.debug ? 'Enabled' : 'Disabled'}`);
    console.log(`  Log Level:   ${config.developer.logLevel}`);
  }
}
