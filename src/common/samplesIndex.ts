import type { SampleEntry } from '../types/analysis';
import { SamplesIndexError } from './errors';
import { MAX_BARCODE, MIN_BARCODE } from './pathRules';

const BARCODE_PATTERN = /^(?:NB|BC|barcode)?(\d+)$/i;

/**
 * Parse a barcode as written in a samples index: `3`, `03`, `NB03`,
 * `BC03` or `barcode03`. Returns `null` for anything else.
 */
export const parseSampleBarcode = (value: string): number | null => {
  const match = BARCODE_PATTERN.exec(value.trim());
  if (!match) return null;
  return Number.parseInt(match[1], 10);
};

const detectDelimiter = (line: string) => {
  if (line.includes('\t')) return '\t';
  if (line.includes(',')) return ',';
  return '\t';
};

/**
 * Parse the contents of a samples index (sample, barcode and optional
 * flow cell per row, tab or comma separated).
 *
 * Every row is checked against the flow cells found in the project; the
 * first problem throws, so a bad index never yields a partial result.
 */
export const parseSamplesIndex = (content: string, flowCells: string[]): SampleEntry[] => {
  const samples: SampleEntry[] = [];
  const seenNames = new Set<string>();
  const knownFlowCells = new Set(flowCells);
  const lines = content.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) return;

    const cells = line.split(detectDelimiter(line)).map((cell) => cell.trim());
    if (samples.length === 0 && cells[0].toLowerCase() === 'sample') {
      return;
    }
    if (cells.length < 2 || cells.length > 3) {
      throw new SamplesIndexError(`expected 2 or 3 columns, found ${cells.length}`, lineNumber);
    }

    const [sample, barcodeText, flowCellText] = cells;
    if (!sample) {
      throw new SamplesIndexError('missing sample name', lineNumber);
    }
    if (seenNames.has(sample)) {
      throw new SamplesIndexError(`duplicate sample name '${sample}'`, lineNumber);
    }

    const barcode = parseSampleBarcode(barcodeText);
    if (barcode === null) {
      throw new SamplesIndexError(`'${barcodeText}': barcode is not an integer`, lineNumber);
    }
    if (barcode < MIN_BARCODE || barcode > MAX_BARCODE) {
      throw new SamplesIndexError(
        `'${barcodeText}': barcode out of range (${MIN_BARCODE}-${MAX_BARCODE})`,
        lineNumber,
      );
    }

    let flowCell: string;
    if (flowCellText) {
      if (!knownFlowCells.has(flowCellText)) {
        throw new SamplesIndexError(`'${flowCellText}': flow cell not found in project`, lineNumber);
      }
      flowCell = flowCellText;
    } else if (knownFlowCells.size === 1) {
      [flowCell] = [...knownFlowCells];
    } else {
      throw new SamplesIndexError(
        `no flow cell given for sample '${sample}' and project has ${knownFlowCells.size} flow cells`,
        lineNumber,
      );
    }

    seenNames.add(sample);
    samples.push({ sample, barcode, flowCell });
  });

  return samples;
};

export const sortSamples = (samples: SampleEntry[]) =>
  [...samples].sort(
    (a, b) => a.flowCell.localeCompare(b.flowCell) || a.barcode - b.barcode || a.sample.localeCompare(b.sample),
  );
