import type { DocumentFetchResult, SsmClientFactory, SsmDocumentGateway } from '../types/index.js';
import { parseDocumentArn } from '../utils/arn.js';
import { describeError, FatalRunError, isCredentialsError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface FetchedDocument {
  arn: string;
  region: string;
  name: string;
  content: unknown;
  client: SsmDocumentGateway;
}

const CREDENTIALS_HINT = 'AWS credentials not found or incomplete. Please configure your AWS environment.';

/**
 * Resolves document ARNs to their content, one region client at a time.
 *
 * Clients are built on first use and kept for the life of the instance. A region
 * whose client could not be built is not remembered, so the next ARN in that
 * region tries again. Missing credentials abort the run with a `FatalRunError`;
 * every other problem is logged and yields `null`.
 */
export class DocumentSource {
  private clientFactory: SsmClientFactory;
  private logger: Logger;
  private clients = new Map<string, SsmDocumentGateway>();

  constructor(clientFactory: SsmClientFactory, logger: Logger) {
    this.clientFactory = clientFactory;
    this.logger = logger;
  }

  clientFor(region: string): SsmDocumentGateway | null {
    const cached = this.clients.get(region);
    if (cached) {
      return cached;
    }

    this.logger.debug(`Initializing SSM client for region: ${region}`);
    try {
      const client = this.clientFactory(region);
      this.clients.set(region, client);
      return client;
    } catch (error) {
      if (isCredentialsError(error)) {
        throw new FatalRunError(`${CREDENTIALS_HINT} (${describeError(error)})`);
      }
      this.logger.error(`Failed to initialize SSM client for region ${region}: ${describeError(error)}. Skipping.`);
      return null;
    }
  }

  async fetch(arn: string): Promise<FetchedDocument | null> {
    const parsed = parseDocumentArn(arn);
    if (!parsed.ok) {
      this.logger.warn(`Could not parse ARN: '${arn}'. Skipping.`);
      return null;
    }

    const client = this.clientFor(parsed.region);
    if (!client) {
      return null;
    }

    let result: DocumentFetchResult;
    try {
      result = await client.getDocumentContent(parsed.name);
    } catch (error) {
      if (isCredentialsError(error)) {
        throw new FatalRunError(`${CREDENTIALS_HINT} (${describeError(error)})`);
      }
      this.logger.error(`AWS error fetching document '${parsed.name}' (${arn}): ${describeError(error)}`);
      return null;
    }

    switch (result.kind) {
      case 'found':
        return { arn, region: parsed.region, name: parsed.name, content: result.content, client };
      case 'not-found':
        this.logger.warn(`Document '${parsed.name}' not found or invalid format (as per AWS): ${result.message}`);
        return null;
      case 'empty':
        this.logger.warn(`Document '${parsed.name}' has no content.`);
        return null;
      case 'malformed':
        this.logger.error(
          `Failed to parse JSON content for document '${parsed.name}': ${result.message}`
        );
        return null;
    }
  }
}
