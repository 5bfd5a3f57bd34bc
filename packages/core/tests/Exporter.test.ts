import { Exporter, formatName } from '../src/codec/Exporter';
import { Importer } from '../src/codec/Importer';
import { NATIVE_DIALECT, instrumentDialect } from '../src/codec/types';
import type { InstrumentRow } from '../src/codec/types';
import { PointRegistry } from '../src/points/PointRegistry';
import { resolvePointSettings } from '../src/points/settings';
import { makeInput, silenceConsole } from './helpers';

const exporter = new Exporter();

describe('formatName', () => {
  it('pads ids to three digits', () => {
    expect(formatName('zircon_a', 3)).toBe('zircon_a_#003');
    expect(formatName('zircon_a', 1234)).toBe('zircon_a_#1234');
  });
});

describe('Exporter (native dialect)', () => {
  let registry: PointRegistry;

  beforeEach(() => {
    silenceConsole();
    registry = new PointRegistry();
    registry.add(
      makeInput(
        120,
        45,
        {
          label: 'Spot',
          sampleName: 'zircon_a',
          diameter: 20,
          scale: 2.5,
          colour: '#ff0000',
          mountName: 'mount_1',
          material: 'zircon',
          notes: 'core, rim',
        },
        3
      )
    );
    registry.add(makeInput(7, 8));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes the fixed header and one line per point', () => {
    expect(exporter.toNativeCSV(registry.getAll())).toBe(
      [
        'Name,label,x,y,diameter,scale,colour,mount_name,material,notes',
        'zircon_a_#003,Spot,120,45,20,2.5,#ff0000,mount_1,zircon,"core, rim"',
        'None_#004,RefMark,7,8,10,1,#ffff00,None,None,',
        '',
      ].join('\n')
    );
  });

  it('reads back every field it writes', () => {
    const csv = exporter.toNativeCSV(registry.getAll());
    const result = new Importer().fromCSV(csv, NATIVE_DIALECT, resolvePointSettings());

    expect(result.skippedCount).toBe(0);
    expect(result.rows).toEqual(registry.getAll());
  });
});

describe('Exporter (native dialect, empty metadata)', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('keeps empty free-text fields instead of the import defaults', () => {
    const registry = new PointRegistry();
    registry.add(makeInput(5, 6, { colour: '', mountName: '', material: '', notes: '' }));

    const csv = exporter.toNativeCSV(registry.getAll());
    expect(csv.split('\n')[1]).toBe('None_#001,RefMark,5,6,10,1,,,,');

    const result = new Importer().fromCSV(
      csv,
      NATIVE_DIALECT,
      resolvePointSettings({ notes: 'x', mountName: 'mount_9' })
    );
    const [point] = result.rows;
    expect([point.mountName, point.material, point.colour, point.notes]).toEqual(['', '', '', '']);
    expect(result.rows).toEqual(registry.getAll());
  });
});

describe('Exporter (instrument dialect)', () => {
  it('restores the instrument x origin and keeps other columns', () => {
    const rows: InstrumentRow[] = [
      {
        rowNumber: 1,
        id: 5,
        isReference: false,
        x: 30.1234567,
        y: 2,
        record: { id: '5', cx: '0', cy: '0', kind: 'Zircon' },
      },
    ];
    const dialect = instrumentDialect(100, {
      idColumn: 'id',
      xColumn: 'cx',
      yColumn: 'cy',
      labelColumn: 'kind',
    });

    expect(exporter.toInstrumentCSV(['id', 'cx', 'cy', 'kind'], rows, dialect)).toBe(
      'id,cx,cy,kind\n5,69.876543,2,Zircon\n'
    );
  });
});
