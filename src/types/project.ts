/** Role of one folder, from its name or contents */
export type ProjectRole =
  | 'flow-cell'
  | 'basecalling'
  | 'data'
  | 'barcode-leaf'
  | 'unknown';

export type DataCategory = 'bam' | 'fastq' | 'pod5' | 'fast5';

export type DataStatus = 'pass' | 'fail' | 'skip';

export type ReportFormat = 'json' | 'md' | 'html';

export interface ReportFile {
  /** File name, e.g. `report_PAW12345.html` */
  name: string;
  path: string;
  format: ReportFormat;
  /** Identifier following `report_`, usually starting with the flow cell ID */
  label: string;
}

export interface DataDir {
  name: string;
  path: string;
  /** `null` for `<prefix>_pass`/`<prefix>_fail` folders with an unknown prefix */
  category: DataCategory | null;
  status: DataStatus | null;
  barcodes: number[];
}

export interface FlowCell {
  kind: 'flow-cell';
  /** Folder name, e.g. `20240612_0123_1A_PAW12345_678ab90c` */
  name: string;
  id: string;
  path: string;
  relativePath: string;
  date: string;
  time: string;
  position: string;
  hash: string;
  pool: string | null;
  run: string | null;
  dataDirs: DataDir[];
  /** Union of the barcode numbers found under every data folder */
  barcodes: number[];
  reports: ReportFile[];
  sampleSheet: string | null;
}

export interface BasecallsDir {
  kind: 'basecalling';
  name: string;
  path: string;
  relativePath: string;
  /** Name of the folder holding the basecalling folder */
  parent: string;
  pool: string | null;
  run: string | null;
  passDir: string;
  failDir: string;
  barcodes: number[];
  reports: ReportFile[];
  sampleSheet: string | null;
}

export type SequencingUnit = FlowCell | BasecallsDir;

export interface Pool {
  name: string;
  path: string;
  run: string | null;
  /** 1 for the first sequencing of a pool name, 2 for the next, ... */
  repeat: number;
  flowCells: FlowCell[];
}

export interface Run {
  name: string;
  path: string;
  pools: Pool[];
}

export type ScanDiagnosticKind =
  | 'malformed-flow-cell-name'
  | 'malformed-barcode'
  | 'unreadable-directory'
  | 'orphan-basecalls';

export interface ScanDiagnostic {
  kind: ScanDiagnosticKind;
  path: string;
  relativePath: string;
  message: string;
}

export interface Project {
  name: string;
  /** `PROMETHION#<NNN>` for `PromethION_Project_<NNN>_<Name>` folders */
  id: string | null;
  path: string;
  runs: Run[];
  /** Pools found without a run level */
  pools: Pool[];
  flowCells: FlowCell[];
  basecallsDirs: BasecallsDir[];
  diagnostics: ScanDiagnostic[];
}
