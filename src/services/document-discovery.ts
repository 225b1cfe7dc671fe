import type {
  AccountIdResolver,
  DiscoveryConfig,
  DiscoverySummary,
  RunOutcome,
  SsmClientFactory,
} from '../types/index.js';
import { buildDocumentArn } from '../utils/arn.js';
import { describeError, FatalRunError, isCredentialsError } from '../utils/errors.js';
import { writeLineList } from '../utils/files.js';
import type { Logger } from '../utils/logger.js';
import { DocumentSource } from './document-source.js';

export interface DocumentDiscoveryDependencies {
  clientFactory: SsmClientFactory;
  resolveAccountId: AccountIdResolver;
  logger: Logger;
}

/**
 * Lists every self-owned Automation document in the given regions and writes
 * their ARNs, which is the input the filter expects.
 */
export class DocumentDiscoveryService {
  private source: DocumentSource;
  private resolveAccountId: AccountIdResolver;
  private logger: Logger;

  constructor({ clientFactory, resolveAccountId, logger }: DocumentDiscoveryDependencies) {
    this.source = new DocumentSource(clientFactory, logger);
    this.resolveAccountId = resolveAccountId;
    this.logger = logger;
  }

  async run(config: DiscoveryConfig): Promise<RunOutcome<DiscoverySummary>> {
    try {
      const summary = await this.discover(config);

      this.logger.info(
        `Discovered ${summary.discovered} Automation documents across ${summary.regions} regions.`
      );
      if (summary.failedRegions.length > 0) {
        this.logger.warn(`Regions skipped after errors: ${summary.failedRegions.join(', ')}`);
      }
      this.logger.info(`Document ARNs saved to '${summary.outputFile}'.`);

      return { success: true, summary };
    } catch (error) {
      if (error instanceof FatalRunError) {
        this.logger.error(`${error.message}. Aborting.`);
        return { success: false, reason: error.message };
      }
      throw error;
    }
  }

  private async discover(config: DiscoveryConfig): Promise<DiscoverySummary> {
    if (config.regions.length === 0) {
      throw new FatalRunError('No regions provided');
    }

    const accountId = await this.accountId();
    this.logger.info(`Using AWS account: ${accountId}`);

    const arns: string[] = [];
    const failedRegions: string[] = [];

    for (const region of config.regions) {
      this.logger.info(`Discovering self-owned SSM Automation documents in ${region}...`);

      const client = this.source.clientFor(region);
      if (!client) {
        failedRegions.push(region);
        continue;
      }

      try {
        const names = await client.listAutomationDocumentNames();
        this.logger.info(`Found ${names.length} documents in ${region}.`);
        arns.push(...names.map(name => buildDocumentArn(region, accountId, name)));
      } catch (error) {
        if (isCredentialsError(error)) {
          throw new FatalRunError(`AWS credentials not found or incomplete (${describeError(error)})`);
        }
        this.logger.error(`Failed to list SSM documents in ${region}: ${describeError(error)}. Skipping region.`);
        failedRegions.push(region);
      }
    }

    await writeLineList(config.outputFile, arns);

    return {
      regions: config.regions.length,
      discovered: arns.length,
      failedRegions,
      outputFile: config.outputFile,
    };
  }

  private async accountId(): Promise<string> {
    try {
      return await this.resolveAccountId();
    } catch (error) {
      throw new FatalRunError(`Failed to retrieve AWS account id: ${describeError(error)}`);
    }
  }
}
