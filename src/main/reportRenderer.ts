import type { AnalysisDir, ReportMode } from '../types/analysis';
import { TemplateError } from '../common/errors';
import { MISSING_VALUE, fmtValue } from '../common/format';

export const REPORT_MODES: readonly ReportMode[] = ['summary', 'tsv'];

export const BUILTIN_TEMPLATES: Readonly<Record<string, string>> = {
  default: 'name,id,NULL,NULL,user,pi,application,organism,NULL,nsamples,samples,NULL,NULL,NULL',
  bcf: 'datestamp,NULL,user,id,#samples,NULL,organism,application,PI,analysis_dir,NULL,primary_data',
  summary: 'name,id,datestamp,platform,analysis_dir,NULL,user,pi,application,organism,primary_data,comments',
};

interface FieldSpec {
  label: string;
  value: (analysis: AnalysisDir) => string;
}

const sampleCount = (analysis: AnalysisDir) => {
  const count = analysis.metadata.samples.length;
  return count === 0 ? MISSING_VALUE : String(count);
};

const sampleNames = (analysis: AnalysisDir) =>
  analysis.metadata.samples.map((entry) => entry.sample).join(',') || MISSING_VALUE;

/** `null` entries are placeholders: an empty value, or a blank line in summary mode */
const FIELD_TABLE: Readonly<Record<string, FieldSpec | null>> = {
  '': null,
  null: null,
  name: { label: 'Project name', value: ({ metadata }) => fmtValue(metadata.name) },
  id: { label: 'Project ID', value: ({ metadata }) => fmtValue(metadata.id) },
  datestamp: { label: 'Datestamp', value: ({ metadata }) => fmtValue(metadata.datestamp) },
  platform: { label: 'Platform', value: ({ metadata }) => fmtValue(metadata.platform) },
  user: { label: 'User', value: ({ metadata }) => fmtValue(metadata.user) },
  pi: { label: 'PI', value: ({ metadata }) => fmtValue(metadata.PI) },
  application: { label: 'Application', value: ({ metadata }) => fmtValue(metadata.application) },
  organism: { label: 'Organism', value: ({ metadata }) => fmtValue(metadata.organism) },
  nsamples: { label: '#samples', value: sampleCount },
  '#samples': { label: '#samples', value: sampleCount },
  samples: { label: 'samples', value: sampleNames },
  sample_names: { label: 'samples', value: sampleNames },
  primary_data: { label: 'Primary data dir', value: ({ metadata }) => fmtValue(metadata.dataDir) },
  analysis_dir: { label: 'Analysis dir', value: (analysis) => analysis.path },
  comments: { label: 'Comments', value: ({ metadata }) => metadata.comments ?? '' },
};

export const isReportMode = (value: string): value is ReportMode =>
  REPORT_MODES.some((mode) => mode === value);

const lookupField = (field: string): FieldSpec | null => {
  const key = field.trim().toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(FIELD_TABLE, key)) {
    throw new TemplateError(`'${field.trim()}': unrecognised field`);
  }
  return FIELD_TABLE[key];
};

export interface ResolvedField {
  label: string | null;
  value: string;
}

export const resolveFields = (analysis: AnalysisDir, fields: string): ResolvedField[] =>
  fields.split(',').map((field) => {
    const spec = lookupField(field);
    return spec ? { label: spec.label, value: spec.value(analysis) } : { label: null, value: '' };
  });

/**
 * Render an analysis directory as a titled `label: value` summary or as a
 * single tab-separated line. Every field is resolved before any output is
 * produced, so an unknown field yields no partial text.
 */
export const renderReport = (analysis: AnalysisDir, fields: string, mode: ReportMode): string => {
  const resolved = resolveFields(analysis, fields);
  if (mode === 'tsv') {
    return resolved.map((field) => field.value).join('\t');
  }
  const title = analysis.metadata.name;
  return [
    title,
    '='.repeat(title.length),
    ...resolved.map((field) => (field.label ? `${field.label.padEnd(16)}: ${field.value}` : '')),
  ].join('\n');
};

export interface TemplateSelection {
  mode: ReportMode;
  fields?: string;
  template?: string;
  templates?: Readonly<Record<string, string>>;
}

export const resolveTemplateFields = ({
  mode,
  fields,
  template,
  templates = BUILTIN_TEMPLATES,
}: TemplateSelection): string => {
  if (fields !== undefined) return fields;
  const name = template ?? (mode === 'summary' ? 'summary' : 'default');
  if (!Object.prototype.hasOwnProperty.call(templates, name)) {
    throw new TemplateError(`'${name}': undefined template`);
  }
  return templates[name];
};
