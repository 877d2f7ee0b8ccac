import fs from 'fs/promises';
import mime from 'mime-types';
import type { ReportFile, ReportFormat } from '../types/project';
import type { ParsedReport, ReportFields, ReportRecord } from '../types/report';
import { normaliseTitle } from '../common/format';
import { classifyName } from '../common/pathRules';
import { createLogger } from '../utils/logger';

const logger = createLogger('report-extractor');

/** Structured formats first: their values win when reports disagree */
export const REPORT_FORMAT_PRIORITY: ReportFormat[] = ['json', 'md', 'html'];

const HTML_DATA_PREFIXES = ['const reportDataJson = ', 'const reportData='];

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const getPath = (value: unknown, keys: string[]): unknown =>
  keys.reduce<unknown>((current, key) => (isObject(current) ? current[key] : undefined), value);

const asText = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
};

export const parseCount = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;
  const cleaned = value.trim().replace(/,/g, '');
  if (!/^\d+$/.test(cleaned)) return undefined;
  return Number.parseInt(cleaned, 10);
};

export const parseDurationSeconds = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;
  const text = value.trim().toLowerCase();
  const clock = /^(\d+):(\d{2}):(\d{2})$/.exec(text);
  if (clock) {
    return Number(clock[1]) * 3600 + Number(clock[2]) * 60 + Number(clock[3]);
  }
  const units = /^(?:(\d+)\s*(?:h|hr|hrs|hours?)\b)?\s*(?:(\d+)\s*(?:m|min|mins|minutes?)\b)?\s*(?:(\d+)\s*(?:s|sec|secs|seconds?)\b)?$/.exec(
    text,
  );
  if (!units || (units[1] === undefined && units[2] === undefined && units[3] === undefined)) {
    return undefined;
  }
  return Number(units[1] ?? 0) * 3600 + Number(units[2] ?? 0) * 60 + Number(units[3] ?? 0);
};

const durationBetween = (start: unknown, end: unknown): number | undefined => {
  if (typeof start !== 'string' || typeof end !== 'string') return undefined;
  const startMs = Date.parse(start);
  const endMs = Date.parse(end);
  if (Number.isNaN(startMs) || Number.isNaN(endMs) || endMs < startMs) return undefined;
  return Math.round((endMs - startMs) / 1000);
};

const barcodeNumber = (name: unknown): number | undefined => {
  if (typeof name !== 'string') return undefined;
  const match = classifyName(name.trim());
  return match.role === 'barcode-leaf' ? match.fields.barcode : undefined;
};

const pick = (values: Record<string, string>, keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = asText(values[key]);
    if (value !== undefined) return value;
  }
  return undefined;
};

/**
 * Map normalised `key → value` pairs (HTML sections, Markdown lines) onto
 * report fields. Keys that do not name a known field are ignored.
 */
const fieldsFromKeyValues = (values: Record<string, string>): ReportFields => {
  const fields: ReportFields = {};
  const assign = <K extends keyof ReportFields>(key: K, value: ReportFields[K] | undefined) => {
    if (value !== undefined) fields[key] = value;
  };

  assign('flowCellId', pick(values, ['flow_cell_id']));
  assign('flowCellType', pick(values, ['flow_cell_type', 'flow_cell_product_code']));
  assign('kit', pick(values, ['kit_type', 'kit', 'sequencing_kit']));
  assign('basecalling', pick(values, ['basecalling']));
  const modifiedBasecalling = pick(values, ['modified_basecalling']);
  assign('modifiedBasecalling', modifiedBasecalling);
  if (modifiedBasecalling?.toLowerCase() === 'on') {
    const modifications = pick(values, ['modifications', 'modified_base_context']);
    if (modifications === undefined) {
      logger.warn("'modifications': metadata item not found");
    }
    assign('modifications', modifications);
  }
  assign('trimBarcodes', pick(values, ['trim_barcodes']));
  assign('basecallingModel', pick(values, ['basecalling_model', 'basecalling_model_version']));
  assign('basecallingConfig', pick(values, ['basecalling_config', 'basecalling_config_filename']));
  assign('readCount', parseCount(values.read_count ?? values.reads_generated));
  assign('runDurationSeconds', parseDurationSeconds(values.run_duration));
  return fields;
};

const extractSection = (data: JsonObject, name: string): Record<string, string> | undefined => {
  const section = data[name];
  if (!Array.isArray(section)) return undefined;
  const values: Record<string, string> = {};
  section.forEach((item) => {
    if (!isObject(item) || typeof item.title !== 'string') return;
    const value = asText(item.value);
    if (value !== undefined) {
      values[normaliseTitle(item.title)] = value;
    }
  });
  return values;
};

export const extractHtmlJson = (content: string): unknown => {
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    const prefix = HTML_DATA_PREFIXES.find((candidate) => line.startsWith(`${candidate}{`));
    if (!prefix) continue;
    const literal = line.slice(prefix.length).replace(/;\s*$/, '');
    try {
      return JSON.parse(literal);
    } catch (error) {
      logger.warn('Embedded report data is not valid JSON', error);
      return undefined;
    }
  }
  return undefined;
};

export const fieldsFromHtmlData = (data: unknown): ReportFields => {
  if (!isObject(data)) return {};
  const values: Record<string, string> = {};
  ['run_setup', 'run_settings', 'run_summary'].forEach((name) => {
    Object.assign(values, extractSection(data, name) ?? {});
  });
  const fields = fieldsFromKeyValues(values);
  const softwareVersions = extractSection(data, 'software_versions');
  if (softwareVersions && Object.keys(softwareVersions).length) {
    fields.softwareVersions = softwareVersions;
  }
  return fields;
};

const flattenVersions = (value: unknown): Record<string, string> | undefined => {
  if (!isObject(value)) return undefined;
  const versions: Record<string, string> = {};
  Object.entries(value).forEach(([key, entry]) => {
    const text = asText(entry) ?? asText(getPath(entry, ['full']));
    if (text !== undefined) {
      versions[normaliseTitle(key)] = text;
    }
  });
  return Object.keys(versions).length ? versions : undefined;
};

const barcodeCountsFromAcquisition = (acquisition: unknown): Record<number, number> | undefined => {
  const counts: Record<number, number> = {};
  asArray(getPath(acquisition, ['acquisition_output']))
    .filter((output) => getPath(output, ['type']) === 'SplitByBarcode')
    .forEach((output) => {
      asArray(getPath(output, ['plot'])).forEach((plot) => {
        const filtering = asArray(getPath(plot, ['filtering']));
        const barcode = filtering
          .map((filter) => barcodeNumber(getPath(filter, ['barcode_name'])))
          .find((value) => value !== undefined);
        const snapshots = asArray(getPath(plot, ['snapshots']));
        const count = parseCount(getPath(snapshots[snapshots.length - 1], ['yield_summary', 'read_count']));
        if (barcode !== undefined && count !== undefined) {
          counts[barcode] = count;
        }
      });
    });
  return Object.keys(counts).length ? counts : undefined;
};

export const fieldsFromJsonReport = (data: unknown): ReportFields => {
  const fields: ReportFields = {};
  if (!isObject(data)) return fields;

  const runInfo = data.protocol_run_info;
  const flowCellId = asText(getPath(runInfo, ['flow_cell', 'flow_cell_id']));
  if (flowCellId !== undefined) fields.flowCellId = flowCellId;
  const flowCellType =
    asText(getPath(runInfo, ['flow_cell', 'user_specified_product_code'])) ??
    asText(getPath(runInfo, ['flow_cell', 'product_code']));
  if (flowCellType !== undefined) fields.flowCellType = flowCellType;
  const kit = asText(getPath(runInfo, ['meta_info', 'tags', 'kit', 'string_value']));
  if (kit !== undefined) fields.kit = kit;
  const softwareVersions = flattenVersions(getPath(runInfo, ['software_versions']));
  if (softwareVersions) fields.softwareVersions = softwareVersions;
  const duration = durationBetween(getPath(runInfo, ['start_time']), getPath(runInfo, ['end_time']));
  if (duration !== undefined) fields.runDurationSeconds = duration;

  asArray(data.acquisitions).forEach((acquisition) => {
    const summary = getPath(acquisition, ['acquisition_run_info', 'config_summary']);
    if (fields.basecallingModel === undefined) {
      const model = asText(getPath(summary, ['basecalling_model_version']));
      if (model !== undefined) fields.basecallingModel = model;
    }
    if (fields.basecallingConfig === undefined) {
      const config = asText(getPath(summary, ['basecalling_config_filename']));
      if (config !== undefined) fields.basecallingConfig = config;
    }
    const readCount = parseCount(getPath(acquisition, ['acquisition_run_info', 'yield_summary', 'read_count']));
    if (readCount !== undefined && (fields.readCount === undefined || readCount > fields.readCount)) {
      fields.readCount = readCount;
    }
    if (fields.barcodeReadCounts === undefined) {
      const counts = barcodeCountsFromAcquisition(acquisition);
      if (counts) fields.barcodeReadCounts = counts;
    }
  });

  return fields;
};

const splitTableRow = (line: string) =>
  line
    .replace(/^\|/, '')
    .replace(/\|$/, '')
    .split('|')
    .map((cell) => cell.trim().replace(/^\*\*(.*)\*\*$/, '$1'));

export const fieldsFromMarkdown = (content: string): ReportFields => {
  const values: Record<string, string> = {};
  const barcodeCounts: Record<number, number> = {};
  const lines = content.split(/\r?\n/);
  let fence: string[] | null = null;

  const addValue = (key: string, value: unknown) => {
    const text = asText(value);
    const normalisedKey = normaliseTitle(key.replace(/\*/g, ''));
    if (text !== undefined && normalisedKey && values[normalisedKey] === undefined) {
      values[normalisedKey] = text;
    }
  };

  lines.forEach((rawLine) => {
    const line = rawLine.trim();
    if (line.startsWith('```')) {
      if (fence === null) {
        fence = [];
        return;
      }
      try {
        const parsed: unknown = JSON.parse(fence.join('\n'));
        if (isObject(parsed)) {
          Object.entries(parsed).forEach(([key, value]) => addValue(key, value));
        }
      } catch {
        logger.debug('Skipping non-JSON code block in Markdown report');
      }
      fence = null;
      return;
    }
    if (fence !== null) {
      fence.push(rawLine);
      return;
    }
    if (line.startsWith('|')) {
      const cells = splitTableRow(line);
      if (cells.length < 2 || /^:?-+:?$/.test(cells[0])) return;
      const barcode = barcodeNumber(cells[0]);
      const count = parseCount(cells[1]);
      if (barcode !== undefined) {
        if (count !== undefined) barcodeCounts[barcode] = count;
        return;
      }
      addValue(cells[0], cells[1]);
      return;
    }
    const keyValue = /^(?:[-*]\s+)?([^:]+?)\s*:\s+(.+)$/.exec(line);
    if (keyValue && !line.startsWith('#')) {
      addValue(keyValue[1], keyValue[2]);
    }
  });

  const fields = fieldsFromKeyValues(values);
  if (Object.keys(barcodeCounts).length) {
    fields.barcodeReadCounts = barcodeCounts;
  }
  return fields;
};

export const detectReportFormat = (filePath: string): ReportFormat | null => {
  switch (mime.lookup(filePath)) {
    case 'application/json':
      return 'json';
    case 'text/markdown':
      return 'md';
    case 'text/html':
      return 'html';
    default:
      return null;
  }
};

/**
 * Parse one report file. Returns `null` when the file cannot be read or
 * holds no recognisable data.
 */
export const parseReportFile = async (
  filePath: string,
  format: ReportFormat | null = detectReportFormat(filePath),
): Promise<ParsedReport | null> => {
  if (format === null) {
    logger.warn(`${filePath}: unsupported report file type`);
    return null;
  }

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    logger.warn(`${filePath}: failed to read report (ignored)`, error);
    return null;
  }

  if (format === 'md') {
    return { format, path: filePath, raw: content, fields: fieldsFromMarkdown(content) };
  }

  if (format === 'html') {
    const raw = extractHtmlJson(content);
    if (raw === undefined) {
      logger.warn(`${filePath}: unable to extract JSON data`);
      return null;
    }
    return { format, path: filePath, raw, fields: fieldsFromHtmlData(raw) };
  }

  try {
    const raw: unknown = JSON.parse(content);
    return { format, path: filePath, raw, fields: fieldsFromJsonReport(raw) };
  } catch (error) {
    logger.warn(`${filePath}: unable to extract JSON data (ignored)`, error);
    return null;
  }
};

export const mergeReportFields = (reports: ParsedReport[]): ReportRecord => {
  const record: ReportRecord = { sources: reports.map((report) => report.path) };
  reports.forEach((report) => {
    Object.entries(report.fields).forEach(([key, value]) => {
      if (value !== undefined && !(key in record)) {
        Object.assign(record, { [key]: value });
      }
    });
  });
  return record;
};

const sortByPriority = (reports: ReportFile[]) =>
  [...reports].sort(
    (a, b) =>
      REPORT_FORMAT_PRIORITY.indexOf(a.format) - REPORT_FORMAT_PRIORITY.indexOf(b.format) ||
      a.name.localeCompare(b.name),
  );

/**
 * Collect metadata from every report of a flow cell or basecalling folder.
 * Missing or unparseable reports give an empty record.
 */
export const extractReportRecord = async (unit: { reports: ReportFile[] }): Promise<ReportRecord> => {
  const parsed: ParsedReport[] = [];
  for (const report of sortByPriority(unit.reports)) {
    const result = await parseReportFile(report.path, report.format);
    if (result) {
      parsed.push(result);
    }
  }
  return mergeReportFields(parsed);
};

export const htmlReport = (unit: { reports: ReportFile[] }) =>
  unit.reports.find((report) => report.format === 'html') ?? null;
