import fs from 'fs';
import path from 'path';
import {
  Importer,
  invertAxis,
  parseInteger,
  parseNumber,
  parsePositiveInteger,
  splitName,
} from '../src/codec/Importer';
import { NATIVE_DIALECT, instrumentDialect } from '../src/codec/types';
import { resolvePointSettings } from '../src/points/settings';
import { PointEngineError } from '../src/points/errors';
import { FIXTURES_DIR } from './helpers';

const importer = new Importer();
const settings = resolvePointSettings();

describe('splitName', () => {
  it('splits on the last separator', () => {
    expect(splitName('grain_#7_#012')).toEqual({ sampleName: 'grain_#7', idText: '012' });
  });

  it('treats a bare number as the id', () => {
    expect(splitName('15')).toEqual({ sampleName: undefined, idText: '15' });
  });

  it('treats other text as the sample name', () => {
    expect(splitName('grain7')).toEqual({ sampleName: 'grain7', idText: undefined });
  });
});

describe('number parsing', () => {
  it('accepts decimal notation only', () => {
    expect(parseNumber(' 12.5 ')).toBe(12.5);
    expect(parseNumber('-.5')).toBe(-0.5);
    expect(parseNumber('1e2')).toBe(100);
    expect(parseNumber('0x10')).toBeNull();
    expect(parseNumber('0b11')).toBeNull();
    expect(parseNumber('Infinity')).toBeNull();
    expect(parseNumber('')).toBeNull();
  });

  it('accepts plain integers within the safe range', () => {
    expect(parseInteger('-3')).toBe(-3);
    expect(parseInteger('1e2')).toBeNull();
    expect(parseInteger('0x10')).toBeNull();
    expect(parsePositiveInteger('007')).toBe(7);
    expect(parsePositiveInteger('0')).toBeNull();
    expect(parsePositiveInteger('9007199254740993')).toBeNull();
  });
});

describe('Importer (native dialect)', () => {
  it('decodes every column and fills blanks from settings', () => {
    const text = fs.readFileSync(path.join(FIXTURES_DIR, 'native_points.csv'), 'utf8');
    const result = importer.fromCSV(text, NATIVE_DIALECT, settings);

    expect(result.success).toBe(true);
    expect(result.rows).toHaveLength(4);
    expect(result.skippedCount).toBe(1);
    expect(result.errors).toEqual(['Row 5: x and y must be integers, got (bad, 350)']);

    expect(result.rows[0]).toEqual({
      id: 1,
      label: 'RefMark',
      x: 100,
      y: 200,
      diameter: 20,
      scale: 2.5,
      colour: '#ff0000',
      sampleName: 'zircon_a',
      mountName: 'mount_1',
      material: 'zircon',
      notes: '',
    });
    expect(result.rows[3].id).toBe(10);
    expect(result.rows[3].notes).toBe('core, dark');
  });

  it('reads legacy Type/X/Y headers and ignores Z', () => {
    const result = importer.fromCSV('Type,X,Y,Z\nSpot,5,6,0\n', NATIVE_DIALECT, settings);
    expect(result.rows).toEqual([
      {
        id: 1,
        label: 'Spot',
        x: 5,
        y: 6,
        diameter: 10,
        scale: 1,
        colour: '#ffff00',
        sampleName: 'None',
        mountName: 'None',
        material: 'None',
        notes: '',
      },
    ]);
  });

  it('falls back to the row number when Name carries no id', () => {
    const result = importer.fromCSV(
      'Name,x,y\ngrain7,1,2\n15,3,4\n',
      NATIVE_DIALECT,
      resolvePointSettings({ sampleName: 'mount_b' })
    );
    expect(result.rows.map((r) => [r.id, r.sampleName])).toEqual([
      [1, 'grain7'],
      [15, 'mount_b'],
    ]);
  });

  it('skips bad rows with a message for each', () => {
    const text = [
      'Name,label,x,y',
      'A_#001,Spot,1.5,2',
      'A_#abc,Spot,1,2',
      'A_#003,Core,1,2',
      'A_#004,Spot,4,5',
      '',
    ].join('\n');
    const result = importer.fromCSV(text, NATIVE_DIALECT, settings);

    expect(result.rows.map((r) => r.id)).toEqual([4]);
    expect(result.skippedCount).toBe(3);
    expect(result.errors).toEqual([
      'Row 1: x and y must be integers, got (1.5, 2)',
      'Row 2: invalid point ID in Name: A_#abc',
      "Row 3: invalid label Core. Use either 'RefMark' or 'Spot'",
    ]);
  });

  it('rejects hexadecimal coordinates and oversized ids', () => {
    const result = importer.fromCSV(
      'Name,x,y\nA_#001,0x10,2\nA_#9007199254740993,1,2\n',
      NATIVE_DIALECT,
      settings
    );
    expect(result.rows).toEqual([]);
    expect(result.errors).toEqual([
      'Row 1: x and y must be integers, got (0x10, 2)',
      'Row 2: invalid point ID in Name: A_#9007199254740993',
    ]);
  });

  it('reports failure when no row decodes', () => {
    const result = importer.fromCSV('x,y\na,b\n', NATIVE_DIALECT, settings);
    expect(result.success).toBe(false);
    expect(result.skippedCount).toBe(1);
  });

  it('throws MISSING_COLUMNS without coordinate columns', () => {
    expect(() => importer.fromCSV('Name,label\nA_#001,Spot\n', NATIVE_DIALECT, settings)).toThrow(
      new PointEngineError('Native CSV file must contain x and y columns', 'MISSING_COLUMNS')
    );
  });
});

describe('Importer (instrument dialect)', () => {
  const text = fs.readFileSync(path.join(FIXTURES_DIR, 'instrument_points.csv'), 'utf8');

  it('flags fiducials and flips the x axis', () => {
    const result = importer.fromCSV(text, instrumentDialect(1000));

    expect(result.headers).toEqual([
      'Particle ID',
      'Laser Ablation Centre X',
      'Laser Ablation Centre Y',
      'Mineral Classification',
      'Area',
    ]);
    expect(result.rows.map((r) => [r.id, r.isReference, r.x, r.y])).toEqual([
      [null, true, 10, 10],
      [null, true, 110, 10],
      [null, true, 10, 110],
      [21, false, 60, 60],
      [22, false, 1000 - 964.6, 20.6],
    ]);
    expect(result.rows[3].record.Area).toBe('12.5');
  });

  it('skips rows with unreadable coordinates or ids', () => {
    const bad = [
      'Particle ID,Laser Ablation Centre X,Laser Ablation Centre Y,Mineral Classification',
      '22,abc,150,Zircon',
      'x7,850,150,Zircon',
      '23,850,150,Zircon',
      '',
    ].join('\n');
    const result = importer.fromCSV(bad, instrumentDialect(1000));

    expect(result.rows.map((r) => r.id)).toEqual([23]);
    expect(result.errors).toEqual([
      'Row 1: coordinates must be numeric, got (abc, 150)',
      'Row 2: point ID must be a positive integer, got x7',
    ]);
    expect(result.skippedCount).toBe(2);
    expect(result.skippedReferenceCount).toBe(0);
  });

  it('counts skipped fiducial rows separately', () => {
    const result = importer.fromCSV(
      'Particle ID,Laser Ablation Centre X,Laser Ablation Centre Y,Mineral Classification\n,oops,1,Fiducial\n',
      instrumentDialect(1000)
    );
    expect(result.skippedCount).toBe(1);
    expect(result.skippedReferenceCount).toBe(1);
  });

  it('uses custom column names', () => {
    const result = importer.fromCSV(
      'id,cx,cy,kind\n5,30,40,mark\n6,10,20,grain\n',
      instrumentDialect(100, {
        idColumn: 'id',
        xColumn: 'cx',
        yColumn: 'cy',
        labelColumn: 'kind',
        referenceLabel: 'mark',
      })
    );
    expect(result.rows.map((r) => [r.id, r.isReference, r.x])).toEqual([
      [5, true, 70],
      [6, false, 90],
    ]);
  });

  it('names every missing column', () => {
    expect(() =>
      importer.fromCSV('Particle ID,Mineral Classification\n1,Zircon\n', instrumentDialect(1000))
    ).toThrow(
      'The given file does not contain the required headers: Laser Ablation Centre X, Laser Ablation Centre Y'
    );
  });
});

describe('invertAxis', () => {
  it('is its own inverse for a fixed width', () => {
    expect(invertAxis(invertAxis(123.5, 1000), 1000)).toBe(123.5);
    expect(invertAxis(0, 640)).toBe(640);
  });
});
