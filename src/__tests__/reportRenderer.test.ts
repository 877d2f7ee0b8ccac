import { TemplateError } from '../common/errors';
import { BUILTIN_TEMPLATES, renderReport, resolveTemplateFields } from '../main/reportRenderer';
import type { AnalysisDir, AnalysisMetadata } from '../types/analysis';

const buildAnalysis = (overrides: Partial<AnalysisMetadata> = {}): AnalysisDir => ({
  path: '/analysis/PromethION_Project_002_PerGynt_analysis',
  metadata: {
    name: 'PromethION_Project_002_PerGynt',
    id: 'PROMETHION#002',
    datestamp: '20240612',
    platform: 'promethion',
    user: 'jdoe',
    PI: 'Per Gynt',
    application: 'RNA-seq',
    organism: 'Human',
    dataDir: '/data/PromethION_Project_002_PerGynt',
    comments: null,
    createdAtIso: '2024-07-01T09:30:00.000Z',
    samples: [
      { sample: 'PG1', barcode: 1, flowCell: 'PAW12345' },
      { sample: 'PG2', barcode: 2, flowCell: 'PAW12345' },
    ],
    ...overrides,
  },
});

describe('renderReport', () => {
  it('keeps one column per field in tsv mode, including null placeholders', () => {
    expect(renderReport(buildAnalysis(), 'id,user,#samples,null', 'tsv')).toBe('PROMETHION#002\tjdoe\t2\t');
  });

  it('resolves field aliases to the same value', () => {
    const analysis = buildAnalysis();
    expect(renderReport(analysis, 'nsamples,#samples,samples,sample_names', 'tsv')).toBe('2\t2\tPG1,PG2\tPG1,PG2');
  });

  it('matches field names case-insensitively', () => {
    expect(renderReport(buildAnalysis(), 'PI,Organism, NAME ', 'tsv')).toBe(
      'Per Gynt\tHuman\tPromethION_Project_002_PerGynt',
    );
  });

  it('shows missing values as question marks and missing comments as empty', () => {
    const analysis = buildAnalysis({ user: null, samples: [], comments: null });
    expect(renderReport(analysis, 'user,nsamples,samples,comments', 'tsv')).toBe('?\t?\t?\t');
  });

  it('renders a titled summary with aligned labels', () => {
    const text = renderReport(buildAnalysis({ comments: 'first pass' }), 'name,id,,user,comments', 'summary');
    expect(text.split('\n')).toEqual([
      'PromethION_Project_002_PerGynt',
      '==============================',
      'Project name    : PromethION_Project_002_PerGynt',
      'Project ID      : PROMETHION#002',
      '',
      'User            : jdoe',
      'Comments        : first pass',
    ]);
  });

  it('renders the bcf template', () => {
    const analysis = buildAnalysis();
    expect(renderReport(analysis, BUILTIN_TEMPLATES.bcf, 'tsv').split('\t')).toEqual([
      '20240612',
      '',
      'jdoe',
      'PROMETHION#002',
      '2',
      '',
      'Human',
      'RNA-seq',
      'Per Gynt',
      '/analysis/PromethION_Project_002_PerGynt_analysis',
      '',
      '/data/PromethION_Project_002_PerGynt',
    ]);
  });

  it('fails on an unknown field', () => {
    expect(() => renderReport(buildAnalysis(), 'id,colour', 'tsv')).toThrow(
      new TemplateError("'colour': unrecognised field"),
    );
  });
});

describe('resolveTemplateFields', () => {
  it('prefers explicit fields over templates', () => {
    expect(resolveTemplateFields({ mode: 'tsv', fields: 'id', template: 'bcf' })).toBe('id');
  });

  it('uses the named template, then the default for the mode', () => {
    expect(resolveTemplateFields({ mode: 'tsv', template: 'bcf' })).toBe(BUILTIN_TEMPLATES.bcf);
    expect(resolveTemplateFields({ mode: 'tsv' })).toBe(BUILTIN_TEMPLATES.default);
    expect(resolveTemplateFields({ mode: 'summary' })).toBe(BUILTIN_TEMPLATES.summary);
  });

  it('looks templates up in the configured set', () => {
    expect(resolveTemplateFields({ mode: 'tsv', template: 'short', templates: { short: 'id,user' } })).toBe('id,user');
    expect(() => resolveTemplateFields({ mode: 'tsv', template: 'short' })).toThrow("'short': undefined template");
  });

  it('does not take inherited object properties for template names', () => {
    expect(() => resolveTemplateFields({ mode: 'tsv', template: 'toString' })).toThrow(
      new TemplateError("'toString': undefined template"),
    );
    expect(() => resolveTemplateFields({ mode: 'tsv', template: 'constructor', templates: { short: 'id' } })).toThrow(
      "'constructor': undefined template",
    );
  });
});
