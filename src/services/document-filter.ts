import type { FilterConfig, FilterSummary, RunOutcome, SsmClientFactory } from '../types/index.js';
import { FatalRunError } from '../utils/errors.js';
import { readLineList, writeLineList } from '../utils/files.js';
import type { Logger } from '../utils/logger.js';
import { DocumentSource } from './document-source.js';
import { hasOutdatedRuntime } from './runtime-classifier.js';

export interface DocumentFilterDependencies {
  clientFactory: SsmClientFactory;
  logger: Logger;
}

/**
 * Reads document ARNs, fetches each document and writes back the ARNs whose
 * `aws:executeScript` steps use an outdated runtime, in input order.
 */
export class DocumentFilterService {
  private source: DocumentSource;
  private logger: Logger;

  constructor({ clientFactory, logger }: DocumentFilterDependencies) {
    this.source = new DocumentSource(clientFactory, logger);
    this.logger = logger;
  }

  async run(config: FilterConfig): Promise<RunOutcome<FilterSummary>> {
    this.logger.info('Starting SSM document filtering.');
    this.logger.info(`Input file: ${config.inputFile}`);
    this.logger.info(`Output file: ${config.outputFile}`);
    this.logger.info(`Outdated runtimes to check: ${config.outdatedRuntimes.join(', ')}`);

    try {
      const summary = await this.filter(config);

      this.logger.info('SSM document filtering complete.');
      this.logger.info(`Processed ${summary.processed} documents.`);
      this.logger.info(`Found ${summary.matched} documents with outdated Python runtimes.`);
      this.logger.info(`Filtered list saved to '${summary.outputFile}'.`);

      return { success: true, summary };
    } catch (error) {
      if (error instanceof FatalRunError) {
        this.logger.error(`${error.message}. Aborting.`);
        return { success: false, reason: error.message };
      }
      throw error;
    }
  }

  private async filter(config: FilterConfig): Promise<FilterSummary> {
    const arns = await readLineList(config.inputFile);

    if (arns.length === 0) {
      this.logger.info('Input file is empty. No documents to process.');
      await writeLineList(config.outputFile, []);
      return { processed: 0, matched: 0, skipped: 0, outputFile: config.outputFile };
    }

    const matches: string[] = [];
    let processed = 0;
    let skipped = 0;

    for (const arn of arns) {
      processed++;
      this.logger.debug(`Processing ARN: ${arn}`);

      const document = await this.source.fetch(arn);
      if (!document) {
        skipped++;
        continue;
      }

      if (hasOutdatedRuntime(document.content, config.outdatedRuntimes, this.logger)) {
        this.logger.info(`Found outdated Python runtime in document: ${arn}`);
        matches.push(arn);
      }
    }

    await writeLineList(config.outputFile, matches);

    return { processed, matched: matches.length, skipped, outputFile: config.outputFile };
  }
}
