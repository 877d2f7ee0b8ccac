import fs from 'fs/promises';
import path from 'path';
import type {
  TransferDryRunItemReport,
  TransferDryRunReport,
  TransferExecutor,
  TransferItem,
  TransferItemResult,
  TransferItemStatus,
  TransferPlan,
  TransferPrecondition,
  TransferResponse,
} from '../types/transfer';
import { errorCode, toError } from '../common/errors';
import { applyAccess, type AccessSettings } from '../common/access';
import { createLogger } from '../utils/logger';

const logger = createLogger('fetch');

const statOrNull = async (targetPath: string) => {
  try {
    return await fs.stat(targetPath);
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') return null;
    throw error;
  }
};

const resolveTarget = (plan: TransferPlan, item: TransferItem) =>
  path.join(plan.targetRoot, ...item.relativePath.split('/').filter(Boolean));

const describeItem = (item: TransferItem) => `Copy ${item.relativePath}`;

const buildDryRunReport = async (plan: TransferPlan): Promise<TransferDryRunReport> => {
  const items: TransferDryRunItemReport[] = [];
  const issues: string[] = [];
  let totalBytes = 0;

  for (const item of plan.items) {
    const targetPath = resolveTarget(plan, item);
    let precondition: TransferPrecondition = 'ok';
    let message: string | undefined;

    const sourceStats = await statOrNull(item.source);
    if (!sourceStats) {
      precondition = 'missing-source';
      message = 'Source file is missing';
    } else {
      const targetStats = await statOrNull(targetPath);
      if (targetStats && targetStats.size === sourceStats.size) {
        precondition = 'up-to-date';
        message = 'Target already present with the same size';
      } else if (targetStats) {
        precondition = 'target-exists';
        message = `Target exists with a different size (${targetStats.size} != ${sourceStats.size} bytes)`;
      } else {
        totalBytes += sourceStats.size;
      }
    }

    if (precondition === 'missing-source' || precondition === 'target-exists') {
      issues.push(`${describeItem(item)}: ${message ?? precondition}`);
    }
    items.push({ item, targetPath, precondition, message });
  }

  return { sourceRoot: plan.sourceRoot, targetRoot: plan.targetRoot, items, issues, totalBytes };
};

export const dryRunTransfer = (plan: TransferPlan) => buildDryRunReport(plan);

export interface TransferExecutionOptions {
  dryRun?: boolean;
  access?: AccessSettings;
}

const recordResult = (
  results: TransferItemResult[],
  item: TransferItem,
  status: TransferItemStatus,
  targetPath: string,
  message?: string,
) => {
  results.push({ source: item.source, targetPath, status, message });
};

/**
 * Copy every item of a plan under its target root. A dry run is always
 * made first; items it flags as failing are not attempted.
 */
export const executeTransfer = async (
  plan: TransferPlan,
  options: TransferExecutionOptions = {},
): Promise<TransferResponse> => {
  const dryRunReport = await buildDryRunReport(plan);
  const access = options.access ?? {};

  if (options.dryRun) {
    return { ok: dryRunReport.issues.length === 0, dryRun: true, results: [], dryRunReport };
  }

  const results: TransferItemResult[] = [];
  for (const { item, targetPath, precondition, message } of dryRunReport.items) {
    if (precondition === 'up-to-date') {
      recordResult(results, item, 'skipped', targetPath, message);
      continue;
    }
    if (precondition !== 'ok') {
      recordResult(results, item, 'failed', targetPath, message);
      continue;
    }
    try {
      await fs.mkdir(path.dirname(targetPath), { recursive: true });
      await fs.copyFile(item.source, targetPath);
      await applyAccess(targetPath, access);
      recordResult(results, item, 'applied', targetPath);
    } catch (error: unknown) {
      const reason = toError(error).message;
      logger.error(`Failed to copy ${item.source}: ${reason}`);
      recordResult(results, item, 'failed', targetPath, reason);
    }
  }

  const ok = !results.some((result) => result.status === 'failed');
  logger.info(
    `Transferred ${results.filter((result) => result.status === 'applied').length} of ${results.length} file(s) to ${plan.targetRoot}`,
  );
  return { ok, dryRun: false, results, dryRunReport };
};

export const createCopyExecutor = (options: Omit<TransferExecutionOptions, 'dryRun'> = {}): TransferExecutor => ({
  transfer: (plan, transferOptions) => executeTransfer(plan, { ...options, dryRun: transferOptions?.dryRun }),
});
