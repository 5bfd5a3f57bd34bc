/**
 * Row Codec Module
 *
 * Native / Instrument CSV 방언
 */

export * from './types';
export { parseCsv, stringifyCsv } from './csv';
export type { CsvTable, CsvValue } from './csv';
export {
  Importer,
  importer,
  invertAxis,
  parseInteger,
  parseNumber,
  parsePositiveInteger,
  splitName,
} from './Importer';
export { Exporter, exporter, formatName } from './Exporter';
