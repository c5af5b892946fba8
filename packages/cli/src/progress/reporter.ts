/**
 * Progress reporter with ora spinners
 *
 * Everything goes to stderr: stdout carries the report when no output
 * file is given.
 */

import type { AttemptOutcome } from '@slipfinder/lichess';
import chalk from 'chalk';
import ora, { type Color, type Ora } from 'ora';

import { formatAttempt, formatDuration, formatSeverityCounts } from './formatters.js';
import {
  PHASE_NAMES,
  type ColorFunctions,
  type ProgressReporterOptions,
  type RunPhase,
  type RunReporter,
  type RunStats,
  type ServiceStatus,
} from './types.js';

function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter implements RunReporter {
  private spinner: Ora | null = null;
  private startTime: number = Date.now();
  private phaseStartTime: number = 0;
  private gameText: string = '';
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  private print(line: string): void {
    console.error(line);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    this.print(this.c.bold(`Slipfinder v${version}`));
    this.print('');
  }

  /**
   * Start timing the run
   */
  startRun(): void {
    this.startTime = Date.now();
  }

  /**
   * Report service health check results
   */
  reportServiceStatus(services: ServiceStatus[]): void {
    if (this.silent) return;

    this.print(this.c.dim('Checking services...'));
    for (const service of services) {
      const status = service.healthy ? this.c.green('✓') : this.c.red('✗');
      const latency = service.latencyMs !== undefined ? this.c.dim(` - ${service.latencyMs}ms`) : '';
      const error = service.error ? this.c.red(` (${service.error})`) : '';
      this.print(`  ${status} ${service.name}${latency}${error}`);
    }
    this.print('');
  }

  startPhase(phase: RunPhase, detail?: string): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    this.stopSpinner();
    const suffix = detail ? this.c.dim(` (${detail})`) : '';
    this.print(`${this.c.bold(PHASE_NAMES[phase])}${suffix}`);
  }

  completePhase(phase: RunPhase, detail?: string): void {
    if (this.silent) return;

    this.stopSpinner();
    const elapsed = formatDuration(Date.now() - this.phaseStartTime);
    const suffix = detail ? ` ${detail}` : '';
    this.print(`  ${this.c.green('✓')} ${PHASE_NAMES[phase]}:${suffix} ${this.c.dim(`(${elapsed})`)}`);
  }

  failPhase(phase: RunPhase, error: string): void {
    if (this.silent) return;

    this.stopSpinner();
    this.print(`  ${this.c.red('✗')} ${PHASE_NAMES[phase]}: ${error}`);
  }

  reportAttempt(outcome: AttemptOutcome): void {
    if (this.silent) return;

    const mark =
      outcome.status === 'games'
        ? this.c.green('✓')
        : outcome.status === 'empty'
          ? this.c.yellow('-')
          : this.c.red('✗');
    this.print(`  ${mark} ${formatAttempt(outcome)}`);
  }

  startGame(index: number, total: number, label: string): void {
    if (this.silent) return;

    this.stopSpinner();
    this.gameText = `Game ${index + 1}/${total}: ${label}`;

    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: this.gameText,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update the ply counter of the current game
   */
  updatePly(ply: number, totalPlies: number): void {
    if (this.silent || !this.spinner) return;
    this.spinner.text = `${this.gameText} ${this.c.dim(`ply ${ply}/${totalPlies}`)}`;
  }

  completeGame(_index: number, _total: number, records: number): void {
    if (this.silent) return;

    const found = records === 0 ? this.c.dim('no errors') : `${records} error(s)`;
    if (this.spinner) {
      this.spinner.succeed(`${this.gameText}: ${found}`);
      this.spinner = null;
    } else {
      this.print(`  ${this.c.green('✓')} ${this.gameText}: ${found}`);
    }
  }

  skipGame(index: number, total: number, reason: string): void {
    if (this.silent) return;

    const text = `Game ${index + 1}/${total} skipped: ${reason}`;
    if (this.spinner) {
      this.spinner.warn(this.c.yellow(text));
      this.spinner = null;
    } else {
      this.print(`  ${this.c.yellow('⚠')} ${text}`);
    }
  }

  /**
   * Display a warning message
   */
  warn(message: string): void {
    if (this.silent) return;
    this.print(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Print the final summary
   */
  printSummary(stats: RunStats): void {
    if (this.silent) return;

    this.stopSpinner();
    this.print('');
    this.print(this.c.bold('Summary:'));
    this.print(`  Games retrieved: ${stats.gamesRetrieved}`);
    this.print(`  Games analyzed: ${stats.gamesAnalyzed}`);
    if (stats.parseFailures > 0) {
      this.print(`  Unparseable: ${this.c.yellow(String(stats.parseFailures))}`);
    }
    if (stats.gamesSkipped > 0) {
      this.print(`  Skipped: ${this.c.yellow(String(stats.gamesSkipped))}`);
    }
    this.print(`  Errors found: ${stats.records} (${formatSeverityCounts(stats.bySeverity)})`);
    this.print(`  Total time: ${formatDuration(Date.now() - this.startTime)}`);
  }

  /**
   * Print where the report went
   */
  printOutputLocation(outputPath: string): void {
    if (this.silent) return;
    this.print('');
    this.print(`Report written to: ${this.c.cyan(outputPath)}`);
  }

  printMessage(message: string): void {
    if (this.silent) return;
    this.print(message);
  }

  printSuccess(message: string): void {
    if (this.silent) return;
    this.print(this.c.green(`✓ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    this.stopSpinner();
  }

  private stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
