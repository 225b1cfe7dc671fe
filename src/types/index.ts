export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export type ArnParseResult =
  | { ok: true; region: string; name: string }
  | { ok: false; reason: string };

export type DocumentFetchResult =
  | { kind: 'found'; content: unknown }
  | { kind: 'not-found'; message: string }
  | { kind: 'empty' }
  | { kind: 'malformed'; message: string };

/**
 * The subset of Systems Manager the audit needs. Implementations throw on remote
 * failures other than a missing or invalid document.
 */
export interface SsmDocumentGateway {
  readonly region: string;
  getDocumentContent(documentName: string): Promise<DocumentFetchResult>;
  listAutomationDocumentNames(): Promise<string[]>;
  updateDocumentContent(documentName: string, content: string): Promise<string | undefined>;
}

export type SsmClientFactory = (region: string) => SsmDocumentGateway;

export type AccountIdResolver = () => Promise<string>;

export type RunOutcome<TSummary> =
  | { success: true; summary: TSummary }
  | { success: false; reason: string };

export interface FilterConfig {
  inputFile: string;
  outputFile: string;
  outdatedRuntimes: string[];
}

export interface FilterSummary {
  processed: number;
  matched: number;
  skipped: number;
  outputFile: string;
}

export interface DiscoveryConfig {
  regions: string[];
  outputFile: string;
}

export interface DiscoverySummary {
  regions: number;
  discovered: number;
  failedRegions: string[];
  outputFile: string;
}

export interface UpgradeConfig {
  inputFile: string;
  outdatedRuntimes: string[];
  targetRuntime: string;
  apply: boolean;
}

export interface UpgradeSummary {
  processed: number;
  upgraded: number;
  unchanged: number;
  failed: number;
  applied: boolean;
}

export interface OutdatedStep {
  index: number;
  name: string;
  runtime: string;
}
