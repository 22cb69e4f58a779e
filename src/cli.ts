/**
 * Command line front end
 *
 * Builds the configuration once (files → env → flags), wires the
 * components and runs the pipeline once or on a schedule.
 *
 * Exit codes: 0 when the run completes (stories may have been skipped),
 * 1 when the front page cannot be listed or the configuration is unusable.
 */
import { parseArgs } from 'node:util';
import boxen from 'boxen';
import chalk from 'chalk';
import { loadConfig, requireSettings, type Config, type ConfigLayer } from './lib/config.js';
import type { CompletionClient } from './lib/completion-client.js';
import { ConfigError, describeError, FetchError } from './lib/errors.js';
import type { FetchLike } from './lib/http.js';
import { configureLogging, createLogger } from './lib/logger.js';
import { createComponents, pipelineOptionsFromConfig, runPipeline } from './lib/pipeline.js';
import { runOnSchedule, validateCron } from './lib/scheduler.js';
import type { RunReport } from './types/story.js';

const log = createLogger('hn-narrator');

const VERSION = '0.1.0';

export const USAGE = `Usage: hn-narrator [options]

Summarizes the Hacker News front page and narrates each story.

Options:
  --top-n <n>          number of front-page stories to process (default 10)
  -o, --output <dir>   output directory (default ./output)
  --max-tokens <n>     article budget in tokens, about 4 characters each (default 1000)
  --concurrency <n>    stories processed at the same time (default 1)
  --cron <expr>        keep running and repeat on this cron schedule
  -h, --help           show this help`;

export interface CliOptions {
  topN?: number;
  output?: string;
  maxTokens?: number;
  concurrency?: number;
  cron?: string;
  help: boolean;
}

export interface MainDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  fetch?: FetchLike;
  completionClient?: CompletionClient;
  /** Registers `stop` for Ctrl+C; only scheduled runs install it (default: process SIGINT) */
  onInterrupt?: (stop: () => void) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function onProcessInterrupt(stop: () => void): void {
  // Removed after the first Ctrl+C, so a second one exits right away
  process.once('SIGINT', stop);
}

function parsePositiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < 1) {
    throw new ConfigError(`Invalid value for --${flag}`, [`expected a positive integer, got "${value}"`]);
  }
  return Number.parseInt(value, 10);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        'top-n': { type: 'string' },
        output: { type: 'string', short: 'o' },
        'max-tokens': { type: 'string' },
        concurrency: { type: 'string' },
        cron: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new ConfigError('Invalid arguments', [describeError(err)]);
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv);

  return {
    topN: parsePositiveInt('top-n', values['top-n']),
    output: values.output,
    maxTokens: parsePositiveInt('max-tokens', values['max-tokens']),
    concurrency: parsePositiveInt('concurrency', values.concurrency),
    cron: values.cron,
    help: values.help ?? false,
  };
}

/**
 * Flags as a config layer, applied over files and environment
 */
export function cliOverrides(options: CliOptions): ConfigLayer {
  const pipeline: ConfigLayer = {};
  if (options.topN !== undefined) pipeline.topN = options.topN;
  if (options.concurrency !== undefined) pipeline.concurrency = options.concurrency;
  if (options.cron !== undefined) pipeline.cron = options.cron;

  const overrides: ConfigLayer = { pipeline };
  if (options.output !== undefined) {
    overrides.paths = { output: options.output };
  }
  if (options.maxTokens !== undefined) {
    overrides.extraction = { maxChars: options.maxTokens * 4 };
  }
  return overrides;
}

function printBanner(config: Config): void {
  const [primary, secondary] = [config.languages.primary, config.languages.secondary];
  console.log(
    boxen(
      `${chalk.bold.cyan('hn-narrator')} ${chalk.gray(`v${VERSION}`)}\n\n` +
        `${chalk.green('▸')} Stories:   ${chalk.yellow(`top ${config.pipeline.topN} from ${config.hackerNews.baseUrl}`)}\n` +
        `${chalk.green('▸')} Model:     ${chalk.yellow(config.completion.model)}\n` +
        `${chalk.green('▸')} Languages: ${chalk.yellow(`${primary}, ${secondary}`)}\n` +
        `${chalk.green('▸')} Output:    ${chalk.yellow(config.paths.output)}` +
        (config.pipeline.cron ? `\n\n${chalk.dim('Schedule:')} ${chalk.blue(config.pipeline.cron)}` : ''),
      {
        padding: 1,
        margin: 1,
        borderStyle: 'round',
        borderColor: 'cyan',
      }
    )
  );
}

/**
 * One line per story plus the processed/skipped totals
 */
export function formatReport(report: RunReport): string {
  const lines = report.outcomes.map((outcome) => {
    const { story } = outcome;
    switch (outcome.status) {
      case 'processed':
        return `${chalk.green('✔')} #${story.rank} ${story.title} ${chalk.dim(`[${outcome.languages.join(', ')}]`)}`;
      case 'partial':
        return (
          `${chalk.yellow('◐')} #${story.rank} ${story.title} ${chalk.dim(`[${outcome.languages.join(', ')}]`)} ` +
          chalk.yellow(`missing audio: ${outcome.missing.map((m) => m.language).join(', ')}`)
        );
      case 'skipped':
        return `${chalk.red('✘')} #${story.rank} ${story.title} ${chalk.red(`skipped at ${outcome.stage}: ${outcome.error.message}`)}`;
    }
  });

  const succeeded = report.processed + report.partial;
  const totals =
    `Processed ${succeeded}/${report.listed} stories` +
    (report.partial > 0 ? ` (${report.partial} with missing audio)` : '') +
    `, skipped ${report.skipped}`;

  return [...lines, '', chalk.bold(totals)].join('\n');
}

function printReport(report: RunReport): void {
  console.log(
    boxen(formatReport(report), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: report.skipped > 0 ? 'yellow' : 'green',
      title: 'Story Processing Results',
    })
  );
}

export async function main(argv: string[], deps: MainDependencies = {}): Promise<number> {
  let config: Config;
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }
    config = loadConfig({ cwd: deps.cwd, env: deps.env, overrides: cliOverrides(options) });
    configureLogging(config.logging);
    requireSettings(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      return 1;
    }
    throw err;
  }

  printBanner(config);

  const components = createComponents(config, {
    fetch: deps.fetch,
    completionClient: deps.completionClient,
  });
  const pipelineOptions = pipelineOptionsFromConfig(config);

  const runOnce = async (): Promise<void> => {
    const report = await runPipeline(components, pipelineOptions);
    printReport(report);
  };

  if (config.pipeline.cron) {
    const controller = new AbortController();
    try {
      validateCron(config.pipeline.cron);
      (deps.onInterrupt ?? onProcessInterrupt)(() => {
        log.info('Stopping after the current run (Ctrl+C again to exit now)');
        controller.abort();
      });
      await runOnSchedule(config.pipeline.cron, runOnce, { signal: controller.signal, sleep: deps.sleep });
    } catch (err) {
      if (err instanceof ConfigError) {
        log.error(err.message);
        return 1;
      }
      throw err;
    }
    return 0;
  }

  try {
    await runOnce();
    return 0;
  } catch (err) {
    if (err instanceof FetchError) {
      log.error(`Could not list stories: ${err.message}`);
      return 1;
    }
    log.error(`Run failed: ${describeError(err)}`);
    return 1;
  }
}
