import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { buildFlowCellName, classifyName, classifyPath, detectStructure } from '../common/pathRules';

describe('classifyName', () => {
  it('extracts flow cell fields from a well-formed name', () => {
    const match = classifyName('20240612_0123_1A_PAW12345_678ab90c');
    expect(match).toEqual({
      role: 'flow-cell',
      rule: 'flow_cell',
      fields: { date: '20240612', time: '0123', position: '1A', flowCellId: 'PAW12345', hash: '678ab90c' },
    });
    if (match.role === 'flow-cell') {
      expect(buildFlowCellName(match.fields)).toBe('20240612_0123_1A_PAW12345_678ab90c');
    }
  });

  it('reports a flow cell name with a short hash as malformed', () => {
    expect(classifyName('20240612_0123_1A_PAW12345_678ab9')).toEqual({
      role: 'malformed',
      rule: 'flow_cell',
      reason: "hash '678ab9' has 6 characters (expected 8)",
    });
  });

  it('reports a flow cell name with a bad date as malformed', () => {
    expect(classifyName('2024061_0123_1A_PAW12345_678ab90c')).toEqual({
      role: 'malformed',
      rule: 'flow_cell',
      reason: "date '2024061' is not 8 digits",
    });
  });

  it('recognises data folders', () => {
    expect(classifyName('bam_pass')).toEqual({
      role: 'data',
      rule: 'data_dir',
      fields: { category: 'bam', status: 'pass' },
    });
    expect(classifyName('pod5')).toEqual({
      role: 'data',
      rule: 'raw_data_dir',
      fields: { category: 'pod5', status: null },
    });
    expect(classifyName('other_fail')).toEqual({
      role: 'data',
      rule: 'data_dir',
      fields: { category: null, status: 'fail' },
    });
  });

  it('accepts two-digit barcodes between 1 and 24 only', () => {
    expect(classifyName('barcode07')).toEqual({ role: 'barcode-leaf', rule: 'barcode', fields: { barcode: 7 } });
    expect(classifyName('barcode24')).toEqual({ role: 'barcode-leaf', rule: 'barcode', fields: { barcode: 24 } });
    expect(classifyName('barcode25').role).toBe('malformed');
    expect(classifyName('barcode30').role).toBe('malformed');
    expect(classifyName('barcode00').role).toBe('malformed');
    expect(classifyName('barcode7').role).toBe('malformed');
    expect(classifyName('barcode007').role).toBe('malformed');
  });

  it('recognises reports and sample sheets', () => {
    expect(classifyName('report_PAW12345_20240612_0123_678ab90c.html')).toEqual({
      role: 'report',
      rule: 'report',
      fields: { format: 'html', label: 'PAW12345_20240612_0123_678ab90c', flowCellId: 'PAW12345' },
    });
    expect(classifyName('sample_sheet_PAW12345.csv')).toEqual({
      role: 'sample-sheet',
      rule: 'sample_sheet',
      fields: { label: 'PAW12345.csv' },
    });
  });

  it('leaves other names unclassified', () => {
    expect(classifyName('PG1')).toEqual({ role: 'unknown' });
    expect(classifyName('notes.txt')).toEqual({ role: 'unknown' });
  });
});

describe('classifyPath', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'path-rules-test-'));
    await fs.mkdir(path.join(tempDir, 'basecalls', 'pass', 'barcode01'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'basecalls', 'fail', 'barcode01'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'halfcalls', 'pass', 'barcode01'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'halfcalls', 'fail', 'unclassified'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'badcalls', 'pass', 'barcode30'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'badcalls', 'fail', 'barcode30'), { recursive: true });
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('detects basecalling folders from their pass and fail barcode folders', async () => {
    const classification = await classifyPath(path.join(tempDir, 'basecalls'));
    expect(classification.role).toBe('basecalling');
    expect(classification.name).toBe('basecalls');
  });

  it('needs barcode folders under both pass and fail', async () => {
    expect(await detectStructure(path.join(tempDir, 'halfcalls'))).toBeNull();
    expect((await classifyPath(path.join(tempDir, 'halfcalls'))).role).toBe('unknown');
  });

  it('ignores pass and fail folders holding only out-of-range barcodes', async () => {
    expect(await detectStructure(path.join(tempDir, 'badcalls'))).toBeNull();
  });

  it('leaves pool and run folders to the scanner', async () => {
    await fs.mkdir(path.join(tempDir, 'Run1', 'PG1', '20240612_0123_1A_PAW12345_678ab90c'), { recursive: true });
    expect((await classifyPath(path.join(tempDir, 'Run1'))).role).toBe('unknown');
    expect((await classifyPath(path.join(tempDir, 'Run1', 'PG1'))).role).toBe('unknown');
  });

  it('classifies by name before looking at contents', async () => {
    const classification = await classifyPath(path.join(tempDir, 'basecalls', 'pass', 'barcode01'));
    expect(classification.role).toBe('barcode-leaf');
  });

  it('records directories that cannot be listed', async () => {
    const unreadable = new Map<string, string>();
    const classification = await classifyPath(path.join(tempDir, 'missing'), { unreadable });
    expect(classification.role).toBe('unknown');
    expect(unreadable.get(path.join(tempDir, 'missing'))).toBe('ENOENT');
  });
});
