import { Command, Option } from 'commander';
import chalk from 'chalk';
import {
  DEFAULT_FILTERED_FILENAME,
  DEFAULT_INVENTORY_FILENAME,
  DEFAULT_LOG_LEVEL,
  DEFAULT_OLD_RUNTIMES,
  DEFAULT_TARGET_RUNTIME,
  ExitCode,
  LOG_LEVELS,
  isLogLevel,
  parseRuntimeList,
} from './config.js';
import { AccountIdentityService } from './services/account-identity.js';
import { DocumentDiscoveryService } from './services/document-discovery.js';
import { DocumentFilterService } from './services/document-filter.js';
import { RuntimeUpgradeService } from './services/runtime-upgrade.js';
import { createSsmDocumentService } from './services/ssm-documents.js';
import type { AccountIdResolver, LogLevel, SsmClientFactory } from './types/index.js';
import { createLogger, type Logger } from './utils/logger.js';

export interface CliDependencies {
  clientFactory: SsmClientFactory;
  accountIdResolver: (region: string) => AccountIdResolver;
  loggerFactory: (level: LogLevel) => Logger;
}

export const defaultDependencies: CliDependencies = {
  clientFactory: createSsmDocumentService,
  accountIdResolver: region => {
    const identity = new AccountIdentityService(region);
    return () => identity.getAccountId();
  },
  loggerFactory: level => createLogger({ level }),
};

interface CommonOptions {
  logLevel: string;
}

interface FilterOptions extends CommonOptions {
  inputFile: string;
  outputFile: string;
  oldRuntimes: string;
}

interface DiscoverOptions extends CommonOptions {
  outputFile: string;
}

interface UpgradeOptions extends CommonOptions {
  inputFile: string;
  oldRuntimes: string;
  targetRuntime: string;
  apply?: boolean;
}

function logLevelOption(): Option {
  return new Option('--log-level <level>', 'Set the logging level')
    .choices(LOG_LEVELS)
    .default(DEFAULT_LOG_LEVEL)
    .env('LOG_LEVEL');
}

function oldRuntimesOption(): Option {
  return new Option(
    '--old-runtimes <runtimes>',
    'Comma-separated list of Python runtimes to consider outdated'
  ).default(DEFAULT_OLD_RUNTIMES.join(','));
}

function resolveLogLevel(value: string): LogLevel {
  return isLogLevel(value) ? value : DEFAULT_LOG_LEVEL;
}

/**
 * Parses `--old-runtimes`, printing an error and returning null for a list with
 * no entries.
 */
function resolveRuntimes(value: string): string[] | null {
  const runtimes = parseRuntimeList(value);
  if (runtimes.length === 0) {
    console.error(chalk.red('Error: --old-runtimes must name at least one runtime'));
    return null;
  }
  return runtimes;
}

export function buildProgram(deps: CliDependencies = defaultDependencies): Command {
  const program = new Command();

  program
    .name('ssm-runtime-audit')
    .description('Find AWS SSM Automation documents whose script steps run on outdated Python runtimes')
    .version('1.0.0');

  program
    .command('filter', { isDefault: true })
    .description('Filter SSM document ARNs down to those using outdated Python runtimes')
    .option('--input-file <path>', 'File containing SSM document ARNs, one per line', DEFAULT_INVENTORY_FILENAME)
    .option('--output-file <path>', 'File to write filtered ARNs to', DEFAULT_FILTERED_FILENAME)
    .addOption(oldRuntimesOption())
    .addOption(logLevelOption())
    .action(async (options: FilterOptions) => {
      const outdatedRuntimes = resolveRuntimes(options.oldRuntimes);
      if (!outdatedRuntimes) {
        process.exitCode = ExitCode.Failure;
        return;
      }

      const logger = deps.loggerFactory(resolveLogLevel(options.logLevel));
      const service = new DocumentFilterService({ clientFactory: deps.clientFactory, logger });
      const outcome = await service.run({
        inputFile: options.inputFile,
        outputFile: options.outputFile,
        outdatedRuntimes,
      });

      if (!outcome.success) {
        console.error(chalk.red(`❌ Filtering failed: ${outcome.reason}`));
        process.exitCode = ExitCode.Failure;
        return;
      }

      const { processed, matched, outputFile } = outcome.summary;
      console.log(chalk.green(`✅ ${matched} of ${processed} documents use outdated runtimes. Saved to: ${outputFile}`));
      process.exitCode = ExitCode.Success;
    });

  program
    .command('discover')
    .description('List self-owned SSM Automation documents in the given regions')
    .argument('<regions...>', 'AWS regions to search')
    .option('--output-file <path>', 'File to write document ARNs to', DEFAULT_INVENTORY_FILENAME)
    .addOption(logLevelOption())
    .action(async (regions: string[], options: DiscoverOptions) => {
      const logger = deps.loggerFactory(resolveLogLevel(options.logLevel));
      const service = new DocumentDiscoveryService({
        clientFactory: deps.clientFactory,
        resolveAccountId: deps.accountIdResolver(regions[0] ?? ''),
        logger,
      });
      const outcome = await service.run({ regions, outputFile: options.outputFile });

      if (!outcome.success) {
        console.error(chalk.red(`❌ Discovery failed: ${outcome.reason}`));
        process.exitCode = ExitCode.Failure;
        return;
      }

      const { discovered, outputFile } = outcome.summary;
      console.log(chalk.green(`✅ ${discovered} documents written to: ${outputFile}`));
      console.log(chalk.yellow(`💡 Next: ssm-runtime-audit filter --input-file ${outputFile}`));
      process.exitCode = ExitCode.Success;
    });

  program
    .command('upgrade')
    .description('Rewrite outdated Python runtimes in filtered SSM documents (dry run unless --apply)')
    .option('--input-file <path>', 'File containing filtered SSM document ARNs', DEFAULT_FILTERED_FILENAME)
    .addOption(oldRuntimesOption())
    .option('--target-runtime <runtime>', 'Runtime to move outdated steps to', DEFAULT_TARGET_RUNTIME)
    .option('--apply', 'Publish the rewritten documents as new versions')
    .addOption(logLevelOption())
    .action(async (options: UpgradeOptions) => {
      const outdatedRuntimes = resolveRuntimes(options.oldRuntimes);
      if (!outdatedRuntimes) {
        process.exitCode = ExitCode.Failure;
        return;
      }

      const logger = deps.loggerFactory(resolveLogLevel(options.logLevel));
      const service = new RuntimeUpgradeService({ clientFactory: deps.clientFactory, logger });
      const outcome = await service.run({
        inputFile: options.inputFile,
        outdatedRuntimes,
        targetRuntime: options.targetRuntime,
        apply: options.apply === true,
      });

      if (!outcome.success) {
        console.error(chalk.red(`❌ Upgrade failed: ${outcome.reason}`));
        process.exitCode = ExitCode.Failure;
        return;
      }

      const { upgraded, failed, applied } = outcome.summary;
      if (applied) {
        console.log(chalk.green(`✅ Upgraded ${upgraded} documents to ${options.targetRuntime}`));
      } else {
        console.log(chalk.yellow(`Dry run: ${upgraded} documents would move to ${options.targetRuntime}. Re-run with --apply.`));
      }
      if (failed > 0) {
        console.log(chalk.yellow(`⚠️  ${failed} documents could not be read or updated; see the log above`));
      }
      process.exitCode = ExitCode.Success;
    });

  program.on('--help', () => {
    console.log();
    console.log('Examples:');
    console.log();
    console.log('  # Collect every self-owned Automation document in two regions');
    console.log('  $ ssm-runtime-audit discover us-east-1 eu-west-1');
    console.log();
    console.log('  # Keep the ones that still run python3.6 or python3.7');
    console.log('  $ ssm-runtime-audit filter --old-runtimes python3.6,python3.7');
    console.log();
    console.log('  # Preview, then publish, the runtime change');
    console.log('  $ ssm-runtime-audit upgrade --target-runtime python3.11');
    console.log('  $ ssm-runtime-audit upgrade --target-runtime python3.11 --apply');
    console.log();
  });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}
