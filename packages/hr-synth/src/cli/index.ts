/**
 * hr-synth CLI
 *
 * Usage:
 *   hr-synth generate -n <count> --start <date> --end <date> [options]
 *
 * Environment (a .env file in the working directory is honored):
 *   HR_SYNTH_LOG_LEVEL    pino level (default: warn for the CLI)
 *   HR_SYNTH_LOG_PRETTY   route logs through pino-pretty
 *   HR_SYNTH_DATA_DIR     reference-data directory
 *   HR_SYNTH_CONCURRENCY  employees processed per batch
 */

import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';

import { configFromEnv, type GeneratorConfigInput } from '../config.js';
import { HrSynthError, ConfigurationError, DataIntegrityError } from '../errors.js';
import { OUTPUT_FORMATS, writeTables, type OutputFormat } from '../export/csv.js';
import { generateHrData, type GenerationResult } from '../generator.js';

const VERSION = '0.1.0';

export interface GenerateCommandOptions {
  employees: number;
  start: string;
  end: string;
  seed?: number;
  performance: boolean;
  compensation: boolean;
  validate: boolean;
  dataDir?: string;
  out: string;
  format: OutputFormat;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError(`"${value}" must be at least 1.`);
  }
  return parsed;
}

/**
 * Generator configuration for a CLI run: environment overrides on top of a
 * quieter default log level, plus the validation flag.
 */
export function cliConfig(options: Pick<GenerateCommandOptions, 'validate'>, env: NodeJS.ProcessEnv = process.env): GeneratorConfigInput {
  const fromEnv = configFromEnv(env);
  return {
    ...fromEnv,
    logging: { level: 'warn', ...fromEnv.logging },
    execution: { ...fromEnv.execution, validate: options.validate }
  };
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('hr-synth')
    .description('Generate a consistent synthetic HR dataset with hierarchy and career histories')
    .version(VERSION);

  program
    .command('generate')
    .description('Generate the employee and history tables')
    .requiredOption('-n, --employees <count>', 'Number of employees', parsePositiveInteger)
    .requiredOption('-s, --start <date>', 'Simulation start date (YYYY-MM-DD)')
    .requiredOption('-e, --end <date>', 'Simulation end date (YYYY-MM-DD)')
    .option('--seed <int>', 'Random seed, 0 to 4294967295 (drawn at random when omitted)', parseInteger)
    .option('--no-performance', 'Omit the performance review table')
    .option('--no-compensation', 'Omit the compensation table')
    .option('--no-validate', 'Skip the post-generation integrity checks')
    .option('-d, --data-dir <dir>', 'Reference-data directory', process.env.HR_SYNTH_DATA_DIR)
    .option('-o, --out <dir>', 'Output directory', './hr-data')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('csv'))
    .action(async (options: GenerateCommandOptions) => {
      const spinner = ora(`Generating ${options.employees} employees...`).start();

      try {
        const result = await generateHrData(
          {
            nEmployees: options.employees,
            startDate: options.start,
            endDate: options.end,
            seed: options.seed,
            includePerformance: options.performance,
            includeCompensation: options.compensation
          },
          { dataDir: options.dataDir, config: cliConfig(options) }
        );

        spinner.text = `Writing ${options.format.toUpperCase()} files to ${options.out}...`;
        const written = await writeTables(result.tables, options.out, options.format);
        spinner.succeed(chalk.green(`Generated ${options.employees} employees in ${formatDuration(result.metadata.durationMs)}`));

        printSummary(result, written);
      } catch (error) {
        spinner.fail(chalk.red('Generation failed'));
        printError(error);
        process.exitCode = 1;
      }
    });

  return program;
}

// ============================================================================
// Helper Functions
// ============================================================================

function printSummary(result: GenerationResult, written: readonly string[]): void {
  const { metadata } = result;

  console.log(chalk.bold('\nSummary\n'));
  console.log(`  Seed:     ${chalk.cyan(String(metadata.seed))}`);
  console.log(`  Window:   ${metadata.startDate} → ${metadata.endDate}`);

  const table = new Table({
    head: [chalk.cyan('Table'), chalk.cyan('Rows')],
    colAligns: ['left', 'right']
  });
  for (const [name, count] of Object.entries(metadata.rowCounts)) {
    table.push([name, String(count)]);
  }
  console.log(table.toString());

  console.log(chalk.gray(`\n  ${written.length} files written`));
}

function printError(error: unknown): void {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(`\n${error.message}`));
    for (const issue of error.issues) {
      console.error(chalk.yellow(`  - ${issue}`));
    }
  } else if (error instanceof DataIntegrityError) {
    console.error(chalk.red(`\n${error.violations.length} integrity violation(s):`));
    for (const violation of error.violations.slice(0, 10)) {
      console.error(chalk.yellow(`  - [${violation.rule}] ${violation.message}`));
    }
  } else if (error instanceof HrSynthError) {
    console.error(chalk.red(`\n${error.code}: ${error.message}`));
  } else if (error instanceof Error) {
    console.error(chalk.red(`\nError: ${error.message}`));
  } else {
    console.error(chalk.red(`\nError: ${String(error)}`));
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}

// ============================================================================
// Main Entry Point
// ============================================================================

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync([...argv]);
}

export default main;
