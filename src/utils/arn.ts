import type { ArnParseResult } from '../types/index.js';

const DOCUMENT_ARN_PATTERN = /^arn:aws:ssm:(?<region>[^:]+):(?<accountId>[^:]+):document\/(?<name>.*)$/;

/**
 * Extracts the region and document name from an SSM document ARN.
 * Document names may contain `/`, so everything after `document/` is the name.
 */
export function parseDocumentArn(arn: string): ArnParseResult {
  const match = DOCUMENT_ARN_PATTERN.exec(arn);
  const region = match?.groups?.region;
  const name = match?.groups?.name;

  if (!region || !name) {
    return { ok: false, reason: `not an SSM document ARN: '${arn}'` };
  }

  return { ok: true, region, name };
}

export function buildDocumentArn(region: string, accountId: string, documentName: string): string {
  return `arn:aws:ssm:${region}:${accountId}:document/${documentName}`;
}
