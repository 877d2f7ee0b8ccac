export const MISSING_VALUE = '?';

export const fmtValue = (value: string | number | boolean | null | undefined): string =>
  value === null || value === undefined ? MISSING_VALUE : String(value);

export const fmtYesNo = (value: unknown): 'yes' | 'no' =>
  value === null || value === undefined ? 'no' : 'yes';

/** `Flow cell ID` → `flow_cell_id`, `Pore scan freq.` → `pore_scan_freq` */
export const normaliseTitle = (title: string): string =>
  title.trim().toLowerCase().replace(/[ -]/g, '_').replace(/\./g, '');

export const barcodeDirName = (barcode: number) => `barcode${String(barcode).padStart(2, '0')}`;

/** `[1, 2]` → `1,2`; `-` when there are none */
export const formatBarcodes = (barcodes: number[]) => (barcodes.length ? barcodes.join(',') : '-');
