export interface SampleEntry {
  sample: string;
  barcode: number;
  flowCell: string;
}

export interface AnalysisMetadata {
  name: string;
  id: string | null;
  datestamp: string | null;
  platform: string | null;
  user: string | null;
  PI: string | null;
  application: string | null;
  organism: string | null;
  /** Primary data (project) directory */
  dataDir: string | null;
  comments: string | null;
  createdAtIso: string | null;
  samples: SampleEntry[];
}

export interface AnalysisDir {
  path: string;
  metadata: AnalysisMetadata;
}

export interface CreateAnalysisOptions {
  projectDir: string;
  destination: string;
  user: string;
  PI: string;
  application: string;
  organism: string;
  /** Contents of a samples index file */
  samplesIndex?: string;
  comments?: string;
}

export type ReportMode = 'summary' | 'tsv';
