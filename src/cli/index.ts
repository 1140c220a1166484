import { Command, CommanderError } from 'commander';
import { datasetFetch } from '../sdk/index.js';
import { validateAndMergeConfig } from '../sdk/config.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { buildConfig, PASSWORD_ENV_VAR } from './options.js';
import type { CLIOptions } from './options.js';
import {
  createProgressCallbacks,
  printSummary,
  printDryRun,
  type Verbosity,
} from './progress.js';

/**
 * Accumulate repeated option values into an array.
 * Used for --seed, --keyword and --header which can be specified multiple times.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the commander program with all CLI options.
 *
 * Numeric options carry no commander default so that profile values are
 * not masked; the defaults are shown in the help text instead.
 *
 * @returns The configured Command instance
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('dataset-fetch')
    .description('Crawl a dataset publisher\'s site and download its files')
    .version('0.1.0')
    .argument('[url]', 'Seed URL to crawl (optional when --profile names one)')

    // Scope
    .option('--depth <n>', `Max crawl depth (default: ${CONFIG_DEFAULTS.maxDepth})`)
    .option('--max-pages <n>', `Max pages to visit (default: ${CONFIG_DEFAULTS.maxPages})`)
    .option('--seed <url>', 'Extra seed URL (repeatable)', collect, [])
    .option('--keyword <word>', 'Path keyword that makes a link worth following (repeatable)', collect, [])
    .option('--profile <path>', 'Site profile JSON file')

    // Output
    .option('-o, --output <dir>', 'Output directory', CONFIG_DEFAULTS.outputDir)
    .option('--flat', 'Flat file structure instead of mirror')
    .option('--no-skip-existing', 'Download files even if they already exist on disk')
    .option(
      '--html-threshold <bytes>',
      `HTML responses smaller than this are not saved (default: ${CONFIG_DEFAULTS.htmlSizeThreshold})`,
    )

    // Authentication
    .option('--login-url <url>', 'Login page URL')
    .option('--username <name>', 'Login username')
    .option('--password <password>', `Login password (or set ${PASSWORD_ENV_VAR})`)
    .option('--adapter <name>', 'Form adapter: generic or wordpress')
    .option('--cookie-file <path>', 'Netscape cookie file from a logged-in browser')

    // Fetching
    .option('--header <key:value>', 'Custom header (repeatable)', collect, [])
    .option('--page-delay <ms>', `Delay between pages in ms (default: ${CONFIG_DEFAULTS.pageDelay})`)
    .option('--download-delay <ms>', `Delay between downloads in ms (default: ${CONFIG_DEFAULTS.downloadDelay})`)
    .option('--retries <n>', `Max attempts per request (default: ${CONFIG_DEFAULTS.maxAttempts})`)

    // General
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('--dry-run', 'Show what would be crawled without fetching');

  return program;
}

/**
 * Determine the verbosity level from CLI flags.
 *
 * @param options - The parsed CLI options
 * @returns The verbosity level
 */
function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Validate flag combinations before calling the SDK.
 *
 * @param options - The parsed CLI options
 * @throws Error if validation fails
 */
function validateCLIOptions(options: CLIOptions): void {
  if (options.verbose && options.quiet) {
    throw new Error('Cannot use --verbose and --quiet at the same time.');
  }
  if (options.password !== undefined && options.username === undefined) {
    throw new Error('--password requires --username.');
  }
}

/**
 * Main CLI entry point. Parses command-line arguments, builds
 * configuration, and invokes the SDK's datasetFetch() function.
 *
 * @param argv - The process.argv array to parse
 * @returns The process exit code: 0 on completion, 1 on invalid options or unreachable seeds
 */
export async function run(argv: string[]): Promise<number> {
  const program = createProgram();
  program.exitOverride();

  let exitCode = 0;

  program.action(async (url: string | undefined, options: CLIOptions) => {
    try {
      validateCLIOptions(options);

      const verbosity = getVerbosity(options);

      // Build the SDK config from CLI options
      const config = buildConfig(url, options);

      if (options.dryRun) {
        const merged = validateAndMergeConfig(config);
        printDryRun({
          url: merged.url,
          seeds: merged.seeds ?? [],
          maxDepth: merged.maxDepth,
          maxPages: merged.maxPages,
          outputDir: merged.outputDir,
          outputStructure: merged.outputStructure,
          pageKeywords: merged.pageKeywords,
          loginUrl: merged.loginUrl,
          username: merged.credentials?.username,
          formAdapter: typeof merged.formAdapter === 'string' ? merged.formAdapter : merged.formAdapter.name,
        });
        return;
      }

      // Attach progress callbacks
      const callbacks = createProgressCallbacks(verbosity);
      config.onPageVisited = callbacks.onPageVisited;
      config.onPageSkipped = callbacks.onPageSkipped;
      config.onDownload = callbacks.onDownload;
      config.onAuth = callbacks.onAuth;
      config.onError = callbacks.onError;

      const result = await datasetFetch(config);

      printSummary(result, verbosity);
    } catch (error) {
      process.stderr.write(
        `Error: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      exitCode = 1;
    }
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // --help, --version and usage errors; commander has already printed them
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
