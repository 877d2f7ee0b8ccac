export interface TransferItem {
  source: string;
  /** Path relative to the project directory, reproduced under the target */
  relativePath: string;
}

export interface TransferPlan {
  sourceRoot: string;
  targetRoot: string;
  items: TransferItem[];
}

export type TransferPrecondition = 'ok' | 'missing-source' | 'target-exists' | 'up-to-date';

export interface TransferDryRunItemReport {
  item: TransferItem;
  targetPath: string;
  precondition: TransferPrecondition;
  message?: string;
}

export interface TransferDryRunReport {
  sourceRoot: string;
  targetRoot: string;
  items: TransferDryRunItemReport[];
  issues: string[];
  totalBytes: number;
}

export type TransferItemStatus = 'applied' | 'skipped' | 'failed';

export interface TransferItemResult {
  source: string;
  targetPath: string;
  status: TransferItemStatus;
  message?: string;
}

export interface TransferResponse {
  ok: boolean;
  dryRun: boolean;
  results: TransferItemResult[];
  dryRunReport: TransferDryRunReport;
}

export interface TransferExecutor {
  transfer: (plan: TransferPlan, options?: { dryRun?: boolean }) => Promise<TransferResponse>;
}
