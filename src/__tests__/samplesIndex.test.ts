import { SamplesIndexError } from '../common/errors';
import { parseSampleBarcode, parseSamplesIndex, sortSamples } from '../common/samplesIndex';

describe('parseSampleBarcode', () => {
  it.each([
    ['3', 3],
    ['03', 3],
    ['NB03', 3],
    ['BC03', 3],
    ['barcode03', 3],
    ['x3', null],
    ['3.5', null],
    ['', null],
  ])('parses %p', (input, expected) => {
    expect(parseSampleBarcode(input)).toBe(expected);
  });
});

describe('parseSamplesIndex', () => {
  it('reads three-column comma-separated rows after a header', () => {
    const content = 'Sample,Barcode,Flowcell\nPG1,NB01,PAW12345\nPG2,02,PAW67890\n';
    expect(parseSamplesIndex(content, ['PAW12345', 'PAW67890'])).toEqual([
      { sample: 'PG1', barcode: 1, flowCell: 'PAW12345' },
      { sample: 'PG2', barcode: 2, flowCell: 'PAW67890' },
    ]);
  });

  it('reads tab-separated rows and skips comment lines', () => {
    const content = '#Sample\tBarcode\tFlowcell\nPG1\t1\tPAW12345\n\n# trailing note\n';
    expect(parseSamplesIndex(content, ['PAW12345'])).toEqual([{ sample: 'PG1', barcode: 1, flowCell: 'PAW12345' }]);
  });

  it('assigns the only flow cell to two-column rows', () => {
    expect(parseSamplesIndex('PG1,1\nPG2,2', ['PAW12345'])).toEqual([
      { sample: 'PG1', barcode: 1, flowCell: 'PAW12345' },
      { sample: 'PG2', barcode: 2, flowCell: 'PAW12345' },
    ]);
  });

  it('rejects two-column rows when the flow cell is ambiguous', () => {
    expect(() => parseSamplesIndex('PG1,1', ['PAW12345', 'PAW67890'])).toThrow(
      new SamplesIndexError("no flow cell given for sample 'PG1' and project has 2 flow cells", 1),
    );
  });

  it('rejects out-of-range and non-integer barcodes', () => {
    expect(() => parseSamplesIndex('Sample,Barcode\nPG1,30', ['PAW12345'])).toThrow(
      "Line 2: '30': barcode out of range (1-24)",
    );
    expect(() => parseSamplesIndex('PG1,one', ['PAW12345'])).toThrow("Line 1: 'one': barcode is not an integer");
  });

  it('rejects duplicate samples and unknown flow cells', () => {
    expect(() => parseSamplesIndex('PG1,1\nPG1,2', ['PAW12345'])).toThrow("Line 2: duplicate sample name 'PG1'");
    expect(() => parseSamplesIndex('PG1,1,PAW00000', ['PAW12345'])).toThrow(
      "Line 1: 'PAW00000': flow cell not found in project",
    );
  });

  it('rejects rows with the wrong number of columns', () => {
    expect(() => parseSamplesIndex('PG1', ['PAW12345'])).toThrow(SamplesIndexError);
    expect(() => parseSamplesIndex('PG1,1,PAW12345,extra', ['PAW12345'])).toThrow(
      'Line 1: expected 2 or 3 columns, found 4',
    );
  });
});

describe('sortSamples', () => {
  it('orders by flow cell then barcode', () => {
    const sorted = sortSamples([
      { sample: 'B', barcode: 2, flowCell: 'PAW2' },
      { sample: 'C', barcode: 3, flowCell: 'PAW1' },
      { sample: 'A', barcode: 1, flowCell: 'PAW2' },
    ]);
    expect(sorted.map((entry) => entry.sample)).toEqual(['C', 'A', 'B']);
  });
});
