import {
  SSMClient,
  GetDocumentCommand,
  ListDocumentsCommand,
  UpdateDocumentCommand,
  InvalidDocument,
} from '@aws-sdk/client-ssm';
import { describeError } from '../utils/errors.js';
import type { DocumentFetchResult, SsmClientFactory, SsmDocumentGateway } from '../types/index.js';

export class SsmDocumentService implements SsmDocumentGateway {
  readonly region: string;
  private client: SSMClient;

  constructor(region: string) {
    this.region = region;
    this.client = new SSMClient({ region });
  }

  /**
   * Fetches the JSON form of a document. A document the service reports as missing
   * or invalid, an empty body, and a body that is not JSON are returned as results;
   * every other failure is thrown to the caller.
   */
  async getDocumentContent(documentName: string): Promise<DocumentFetchResult> {
    let body: string | undefined;
    try {
      const response = await this.client.send(
        new GetDocumentCommand({ Name: documentName, DocumentFormat: 'JSON' })
      );
      body = response.Content;
    } catch (error) {
      if (error instanceof InvalidDocument) {
        return { kind: 'not-found', message: error.message };
      }
      throw error;
    }

    if (!body) {
      return { kind: 'empty' };
    }

    try {
      const content: unknown = JSON.parse(body);
      return { kind: 'found', content };
    } catch (error) {
      return { kind: 'malformed', message: describeError(error) };
    }
  }

  async listAutomationDocumentNames(): Promise<string[]> {
    const names: string[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListDocumentsCommand({
          Filters: [
            { Key: 'Owner', Values: ['Self'] },
            { Key: 'DocumentType', Values: ['Automation'] },
          ],
          NextToken: nextToken,
        })
      );

      for (const identifier of response.DocumentIdentifiers ?? []) {
        if (identifier.Name) {
          names.push(identifier.Name);
        }
      }

      nextToken = response.NextToken;
    } while (nextToken);

    return names;
  }

  /**
   * Publishes `content` as a new version of the document and returns that version.
   */
  async updateDocumentContent(documentName: string, content: string): Promise<string | undefined> {
    const response = await this.client.send(
      new UpdateDocumentCommand({
        Name: documentName,
        Content: content,
        DocumentFormat: 'JSON',
        DocumentVersion: '$LATEST',
      })
    );
    return response.DocumentDescription?.DocumentVersion;
  }
}

export const createSsmDocumentService: SsmClientFactory = region => new SsmDocumentService(region);
