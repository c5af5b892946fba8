/**
 * Analyze command implementation
 */

import * as fs from 'node:fs';

import { parseCliOptions, VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import type { CliOptions, SlipfinderConfig } from '../config/schema.js';
import {
  InputError,
  OutputError,
  ServiceError,
  handleError,
  resolveAbsolutePath,
} from '../errors/index.js';
import { orchestrateRun, type RunResult, type RunSource } from '../orchestrator/orchestrator.js';
import {
  closeServices,
  initializeServices,
  performHealthChecks,
  type ServiceOverrides,
} from '../orchestrator/services.js';
import { buildGalleryReport, serializeReport } from '../output/gallery.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';
import type { RunReporter } from '../progress/types.js';

/**
 * Read a PGN file
 */
function readInput(inputPath: string): string {
  const absolutePath = resolveAbsolutePath(inputPath);
  if (!fs.existsSync(absolutePath)) {
    throw new InputError(`Input file not found: ${inputPath}`, 'Check the file path and try again');
  }
  try {
    return fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new InputError(
      `Failed to read input file: ${inputPath}`,
      error instanceof Error ? error.message : undefined,
    );
  }
}

/**
 * Write output to file or stdout
 */
function writeOutput(output: string, outputPath: string | undefined): void {
  if (outputPath) {
    try {
      fs.writeFileSync(resolveAbsolutePath(outputPath), output, 'utf-8');
    } catch (error) {
      throw new OutputError(
        `Failed to write output file: ${outputPath}`,
        error instanceof Error ? error.message : 'unknown error',
      );
    }
  } else {
    process.stdout.write(output);
  }
}

function runSource(options: CliOptions): RunSource {
  if (options.input) {
    const text = readInput(options.input);
    return options.user ? { kind: 'pgn', text, username: options.user } : { kind: 'pgn', text };
  }
  if (!options.user) {
    throw new InputError(
      'No Lichess user given',
      'Pass --user <name>, or --input <file> to analyze a local PGN file',
    );
  }
  return { kind: 'lichess', username: options.user };
}

/**
 * Run the analysis with services that are released on every exit path
 */
export async function runAnalysis(
  source: RunSource,
  config: SlipfinderConfig,
  reporter: RunReporter,
  overrides: ServiceOverrides = {},
): Promise<RunResult> {
  const services = initializeServices(config, overrides);
  try {
    return await orchestrateRun(source, config, services, reporter);
  } finally {
    await closeServices(services);
  }
}

async function dryRun(
  options: CliOptions,
  config: SlipfinderConfig,
  reporter: ProgressReporter,
): Promise<void> {
  const services = initializeServices(config);
  try {
    const username = options.input ? undefined : options.user;
    const healthStatus = await performHealthChecks(config, services, username);
    reporter.reportServiceStatus(healthStatus);

    if (options.input) {
      const inputPath = resolveAbsolutePath(options.input);
      if (fs.existsSync(inputPath)) {
        reporter.printSuccess(`Input file exists: ${inputPath}`);
      } else {
        reporter.warn(`Input file not found: ${inputPath}`);
      }
    }

    const failed = healthStatus.filter((status) => !status.healthy);
    if (failed.length > 0) {
      const detail = failed
        .map((status) => `${status.name}: ${status.error ?? 'unavailable'}`)
        .join('; ');
      throw new ServiceError('Setup', `Some checks failed (${detail})`);
    }

    reporter.printSuccess('Ready to analyze.');
    reporter.printMessage('Dry-run complete. No analysis was performed.');
  } finally {
    await closeServices(services);
  }
}

/**
 * Main analyze command handler
 */
export async function analyzeCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    color: !options.noColor,
    silent: options.quiet ?? false,
  });

  try {
    const config = await loadConfig(options);

    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    reporter.printHeader(VERSION);

    if (options.dryRun) {
      await dryRun(options, config, reporter);
      return;
    }

    const source = runSource(options);
    reporter.startRun();
    const result = await runAnalysis(source, config, reporter);

    reporter.startPhase('output');
    const report = buildGalleryReport(result, config, options.user ?? null);
    writeOutput(serializeReport(report, config.output.pretty), options.output);
    reporter.completePhase('output', `${report.cards.length} card(s)`);

    reporter.printSummary(result.stats);
    if (options.output) {
      reporter.printOutputLocation(options.output);
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
