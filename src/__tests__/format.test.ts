import { barcodeDirName, fmtValue, fmtYesNo, formatBarcodes, normaliseTitle } from '../common/format';

describe('value formatting', () => {
  it('shows missing values as a question mark', () => {
    expect(fmtValue(null)).toBe('?');
    expect(fmtValue(undefined)).toBe('?');
    expect(fmtValue(0)).toBe('0');
    expect(fmtValue('On')).toBe('On');
  });

  it('gives yes or no for presence', () => {
    expect(fmtYesNo({ path: 'report.html' })).toBe('yes');
    expect(fmtYesNo(null)).toBe('no');
  });

  it('lists barcodes for the info table', () => {
    expect(formatBarcodes([1, 2, 12])).toBe('1,2,12');
    expect(formatBarcodes([])).toBe('-');
  });

  it('names barcode folders with two digits', () => {
    expect(barcodeDirName(3)).toBe('barcode03');
    expect(barcodeDirName(24)).toBe('barcode24');
  });

  it('normalises report titles to keys', () => {
    expect(normaliseTitle('Flow cell ID')).toBe('flow_cell_id');
    expect(normaliseTitle('Pore scan freq.')).toBe('pore_scan_freq');
    expect(normaliseTitle(' Trim-barcodes ')).toBe('trim_barcodes');
  });
});
