import fs from 'fs/promises';
import path from 'path';
import { createCopyExecutor, dryRunTransfer, executeTransfer } from '../main/transferExecutor';
import type { TransferPlan } from '../types/transfer';
import { cleanupTempDir, makeTempDir } from '../../tests/fixtures/mockPromethion';

describe('transferExecutor', () => {
  let workspace: string;
  let sourceRoot: string;
  let targetRoot: string;

  const writeSource = async (relativePath: string, content: string) => {
    const filePath = path.join(sourceRoot, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
  };

  const planFor = (relativePaths: string[]): TransferPlan => ({
    sourceRoot,
    targetRoot,
    items: relativePaths.map((relativePath) => ({ source: path.join(sourceRoot, relativePath), relativePath })),
  });

  beforeEach(async () => {
    workspace = await makeTempDir('transfer-executor-test-');
    sourceRoot = path.join(workspace, 'project');
    targetRoot = path.join(workspace, 'archive', 'project');
    await writeSource('PG1/bam_pass/barcode01/reads.bam', 'bam-data');
    await writeSource('PG1/report_PAW12345.html', '<html></html>');
  });

  afterEach(async () => {
    await cleanupTempDir(workspace);
  });

  it('copies files under the target root, creating folders', async () => {
    const response = await executeTransfer(planFor(['PG1/bam_pass/barcode01/reads.bam', 'PG1/report_PAW12345.html']));

    expect(response.ok).toBe(true);
    expect(response.results.map((result) => result.status)).toEqual(['applied', 'applied']);
    expect(await fs.readFile(path.join(targetRoot, 'PG1', 'bam_pass', 'barcode01', 'reads.bam'), 'utf8')).toBe(
      'bam-data',
    );
    expect(response.dryRunReport.totalBytes).toBe('bam-data'.length + '<html></html>'.length);
  });

  it('reports preconditions without copying on a dry run', async () => {
    await fs.mkdir(path.join(targetRoot, 'PG1'), { recursive: true });
    await fs.writeFile(path.join(targetRoot, 'PG1', 'report_PAW12345.html'), 'different');

    const response = await executeTransfer(
      planFor(['PG1/bam_pass/barcode01/reads.bam', 'PG1/report_PAW12345.html', 'PG1/missing.bam']),
      { dryRun: true },
    );

    expect(response.ok).toBe(false);
    expect(response.dryRun).toBe(true);
    expect(response.results).toEqual([]);
    expect(response.dryRunReport.items.map((item) => item.precondition)).toEqual([
      'ok',
      'target-exists',
      'missing-source',
    ]);
    expect(response.dryRunReport.issues).toEqual([
      'Copy PG1/report_PAW12345.html: Target exists with a different size (9 != 13 bytes)',
      'Copy PG1/missing.bam: Source file is missing',
    ]);
    await expect(fs.stat(path.join(targetRoot, 'PG1', 'bam_pass'))).rejects.toThrow();
  });

  it('skips files already present with the same size', async () => {
    const plan = planFor(['PG1/report_PAW12345.html']);
    await executeTransfer(plan);

    const report = await dryRunTransfer(plan);
    expect(report.items[0].precondition).toBe('up-to-date');
    expect(report.issues).toEqual([]);

    const response = await executeTransfer(plan);
    expect(response.ok).toBe(true);
    expect(response.results[0].status).toBe('skipped');
  });

  it('fails items with unmet preconditions but copies the rest', async () => {
    const response = await executeTransfer(planFor(['PG1/missing.bam', 'PG1/report_PAW12345.html']));

    expect(response.ok).toBe(false);
    expect(response.results.map((result) => [result.status, result.message])).toEqual([
      ['failed', 'Source file is missing'],
      ['applied', undefined],
    ]);
  });

  it('applies permissions to copied files through the copy executor', async () => {
    const executor = createCopyExecutor({ access: { permissions: 0o640 } });
    const response = await executor.transfer(planFor(['PG1/report_PAW12345.html']));

    expect(response.ok).toBe(true);
    const stats = await fs.stat(path.join(targetRoot, 'PG1', 'report_PAW12345.html'));
    expect(stats.mode & 0o777).toBe(0o640);
  });
});
