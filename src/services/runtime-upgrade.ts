import { AutomationDocumentSchema, isRecord } from '../types/document.js';
import type {
  OutdatedStep,
  RunOutcome,
  SsmClientFactory,
  UpgradeConfig,
  UpgradeSummary,
} from '../types/index.js';
import { describeError, FatalRunError, isCredentialsError } from '../utils/errors.js';
import { readLineList } from '../utils/files.js';
import type { Logger } from '../utils/logger.js';
import { DocumentSource } from './document-source.js';
import { findOutdatedSteps } from './runtime-classifier.js';

export interface RuntimeRewrite {
  content: unknown;
  changedSteps: OutdatedStep[];
}

/**
 * Returns a copy of `content` in which every `aws:executeScript` step on a
 * denylisted runtime runs on `targetRuntime` instead. All other keys and steps are
 * kept as they are. Content that is not an Automation document comes back
 * unchanged with no changed steps.
 */
export function upgradeDocumentRuntimes(
  content: unknown,
  denylist: readonly string[],
  targetRuntime: string
): RuntimeRewrite {
  const changedSteps = findOutdatedSteps(content, denylist);
  const document = AutomationDocumentSchema.safeParse(content);

  if (changedSteps.length === 0 || !document.success || !document.data.mainSteps || !isRecord(content)) {
    return { content, changedSteps: [] };
  }

  // Spread the raw objects so keys keep their original order in the published JSON.
  const changedIndexes = new Set(changedSteps.map(step => step.index));
  const mainSteps = document.data.mainSteps.map((step, index) => {
    if (!changedIndexes.has(index) || !isRecord(step) || !isRecord(step.inputs)) {
      return step;
    }
    return { ...step, inputs: { ...step.inputs, Runtime: targetRuntime } };
  });

  return { content: { ...content, mainSteps }, changedSteps };
}

export interface RuntimeUpgradeDependencies {
  clientFactory: SsmClientFactory;
  logger: Logger;
}

/**
 * Moves filtered documents onto a supported runtime. Without `apply` it only
 * reports the steps it would change.
 */
export class RuntimeUpgradeService {
  private source: DocumentSource;
  private logger: Logger;

  constructor({ clientFactory, logger }: RuntimeUpgradeDependencies) {
    this.source = new DocumentSource(clientFactory, logger);
    this.logger = logger;
  }

  async run(config: UpgradeConfig): Promise<RunOutcome<UpgradeSummary>> {
    this.logger.info(
      `Starting runtime upgrade to ${config.targetRuntime} from ${config.inputFile}` +
        (config.apply ? '.' : ' (dry run).')
    );

    try {
      const summary = await this.upgrade(config);

      this.logger.info(`Processed ${summary.processed} documents.`);
      this.logger.info(
        `${config.apply ? 'Upgraded' : 'Would upgrade'} ${summary.upgraded} documents; ` +
          `${summary.unchanged} unchanged, ${summary.failed} failed.`
      );

      return { success: true, summary };
    } catch (error) {
      if (error instanceof FatalRunError) {
        this.logger.error(`${error.message}. Aborting.`);
        return { success: false, reason: error.message };
      }
      throw error;
    }
  }

  private async upgrade(config: UpgradeConfig): Promise<UpgradeSummary> {
    if (config.outdatedRuntimes.includes(config.targetRuntime)) {
      throw new FatalRunError(`Target runtime '${config.targetRuntime}' is itself listed as outdated`);
    }

    const arns = await readLineList(config.inputFile);
    const summary: UpgradeSummary = {
      processed: 0,
      upgraded: 0,
      unchanged: 0,
      failed: 0,
      applied: config.apply,
    };

    if (arns.length === 0) {
      this.logger.info('Input file is empty. No documents to upgrade.');
      return summary;
    }

    for (const arn of arns) {
      summary.processed++;

      const document = await this.source.fetch(arn);
      if (!document) {
        summary.failed++;
        continue;
      }

      const rewrite = upgradeDocumentRuntimes(document.content, config.outdatedRuntimes, config.targetRuntime);
      if (rewrite.changedSteps.length === 0) {
        this.logger.info(`No outdated runtimes left in ${arn}.`);
        summary.unchanged++;
        continue;
      }

      for (const step of rewrite.changedSteps) {
        this.logger.info(`${arn}: step '${step.name}' ${step.runtime} -> ${config.targetRuntime}`);
      }

      if (!config.apply) {
        summary.upgraded++;
        continue;
      }

      try {
        const version = await document.client.updateDocumentContent(
          document.name,
          JSON.stringify(rewrite.content, null, 2)
        );
        this.logger.info(`Updated ${document.name} in ${document.region} (version ${version ?? 'unknown'}).`);
        summary.upgraded++;
      } catch (error) {
        if (isCredentialsError(error)) {
          throw new FatalRunError(`AWS credentials not found or incomplete (${describeError(error)})`);
        }
        this.logger.error(`Failed to update document '${document.name}' (${arn}): ${describeError(error)}`);
        summary.failed++;
      }
    }

    return summary;
  }
}
