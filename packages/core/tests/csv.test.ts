import { parseCsv, stringifyCsv } from '../src/codec/csv';
import { isPointEngineError } from '../src/points/errors';

describe('parseCsv', () => {
  it('reads quoted fields and pads short rows', () => {
    const table = parseCsv('a,b\n1,"x, ""y"""\n\n2\n');
    expect(table.headers).toEqual(['a', 'b']);
    expect(table.records).toEqual([
      { a: '1', b: 'x, "y"' },
      { a: '2', b: '' },
    ]);
  });

  it('accepts CRLF line endings and a byte order mark', () => {
    const table = parseCsv('\uFEFF x ,y\r\n3,4\r\n');
    expect(table.headers).toEqual(['x', 'y']);
    expect(table.records).toEqual([{ x: '3', y: '4' }]);
  });

  it('keeps line breaks inside quoted fields', () => {
    const table = parseCsv('notes\n"line 1\nline 2"\n');
    expect(table.records).toEqual([{ notes: 'line 1\nline 2' }]);
  });

  it('rejects a quoted field that is never closed', () => {
    expect(() => parseCsv('a,b\n1,"open\n2,3\n')).toThrow(
      'CSV file is malformed: a quoted field is never closed'
    );
  });

  it.each(['', '\n\n'])('rejects %p as an empty file', (text) => {
    let caught: unknown;
    try {
      parseCsv(text);
    } catch (e) {
      caught = e;
    }
    expect(isPointEngineError(caught, 'MALFORMED_FILE')).toBe(true);
  });
});

describe('stringifyCsv', () => {
  it('quotes only fields that need it', () => {
    expect(
      stringifyCsv(
        ['h1', 'h2'],
        [
          ['a,b', 3],
          ['say "hi"', 'x'],
        ]
      )
    ).toBe('h1,h2\n"a,b",3\n"say ""hi""",x\n');
  });

  it('writes only the header line when there are no rows', () => {
    expect(stringifyCsv(['Name', 'x'], [])).toBe('Name,x\n');
  });
});
