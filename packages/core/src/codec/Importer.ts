/**
 * Row Importer
 *
 * CSV 레코드 → 포인트 입력 / Instrument 행 변환
 *
 * 책임:
 * - 방언별 헤더 해석
 * - 숫자 필드 파싱 (행 단위 실패는 결과에 기록)
 * - 누락된 선택 필드를 기본 설정으로 채움
 * - Instrument 방언의 X축 반전
 */

import type { PointInput, PointSettings } from '../points/types';
import { DEFAULT_POINT_SETTINGS, isPointLabel } from '../points/types';
import { PointEngineError, describeError } from '../points/errors';
import type { CsvTable } from './csv';
import { parseCsv } from './csv';
import type {
  Dialect,
  ImportResult,
  InstrumentDialect,
  InstrumentImportResult,
  InstrumentRow,
  NativeDialect,
} from './types';
import { NAME_ID_SEPARATOR } from './types';

// =============================================================================
// Header Aliases
// =============================================================================

/**
 * Native 필드 → 허용되는 헤더 이름들 (앞쪽 우선)
 *
 * Type/X/Y는 레이저 장비용으로 저장된 이전 파일 호환
 */
const NATIVE_FIELD_HEADERS = {
  name: ['Name'],
  sampleName: ['sample_name'],
  label: ['label', 'Type'],
  x: ['x', 'X'],
  y: ['y', 'Y'],
  diameter: ['diameter'],
  scale: ['scale'],
  colour: ['colour'],
  mountName: ['mount_name'],
  material: ['material'],
  notes: ['notes'],
} as const;

type NativeField = keyof typeof NATIVE_FIELD_HEADERS;

/**
 * 레코드에서 필드 값 조회 (비어 있으면 undefined)
 */
function readField(
  record: Record<string, string>,
  field: NativeField
): string | undefined {
  const value = readRaw(record, field);
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * 레코드에서 필드 값 조회 (컬럼이 있으면 빈 값도 그대로)
 *
 * 자유 텍스트 필드용 - 빈 문자열도 유효한 값
 */
function readRaw(
  record: Record<string, string>,
  field: NativeField
): string | undefined {
  for (const header of NATIVE_FIELD_HEADERS[field]) {
    const value = record[header];
    if (value !== undefined && value.trim() !== '') {
      return value;
    }
  }
  for (const header of NATIVE_FIELD_HEADERS[field]) {
    if (header in record) {
      return record[header];
    }
  }
  return undefined;
}

// =============================================================================
// Value Parsing
// =============================================================================

/**
 * 행 단위 파싱 에러
 */
function malformed(rowNumber: number, message: string): PointEngineError {
  return new PointEngineError(`Row ${rowNumber}: ${message}`, 'MALFORMED_ROW', {
    rowNumber,
  });
}

/**
 * 10진수 표기 (부호, 소수점, 지수 허용 / 0x, 0b, Infinity 불가)
 */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * 정수 표기 ("007", "-3")
 */
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * 숫자 파싱 (빈 문자열, 10진수 이외 표기는 null)
 */
export function parseNumber(text: string | undefined): number | null {
  const trimmed = text?.trim();
  if (trimmed === undefined || !DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * 정수 파싱 (안전한 정수 범위 밖이면 null)
 */
export function parseInteger(text: string | undefined): number | null {
  const trimmed = text?.trim();
  if (trimmed === undefined || !INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * 양의 정수 파싱 ("007" → 7)
 */
export function parsePositiveInteger(text: string | undefined): number | null {
  const value = parseInteger(text);
  return value !== null && value > 0 ? value : null;
}

/**
 * Name 컬럼 분리
 *
 * 마지막 "_#" 기준으로 sampleName / id 분리
 * "_#"가 없으면 정수는 id, 그 외 텍스트는 sampleName으로 취급
 */
export function splitName(
  name: string
): { sampleName: string | undefined; idText: string | undefined } {
  const index = name.lastIndexOf(NAME_ID_SEPARATOR);
  if (index >= 0) {
    return {
      sampleName: name.slice(0, index),
      idText: name.slice(index + NAME_ID_SEPARATOR.length),
    };
  }
  if (parseInteger(name) !== null) {
    return { sampleName: undefined, idText: name };
  }
  return { sampleName: name, idText: undefined };
}

// =============================================================================
// Importer Class
// =============================================================================

/**
 * 행 가져오기 클래스
 */
export class Importer {
  /**
   * CSV 문자열에서 가져오기
   *
   * @throws PointEngineError (MALFORMED_FILE, MISSING_COLUMNS)
   */
  fromCSV(text: string, dialect: NativeDialect, settings: PointSettings): ImportResult<PointInput>;
  fromCSV(text: string, dialect: InstrumentDialect): InstrumentImportResult;
  fromCSV(
    text: string,
    dialect: Dialect,
    settings: PointSettings = DEFAULT_POINT_SETTINGS
  ): ImportResult<PointInput> | InstrumentImportResult {
    const table = parseCsv(text);
    return dialect.kind === 'native'
      ? this.importNative(table, settings)
      : this.importInstrument(table, dialect);
  }

  /**
   * 파싱된 테이블에서 가져오기
   *
   * 구조적 에러는 throw, 행 단위 에러는 결과에 기록
   *
   * @throws PointEngineError (MISSING_COLUMNS)
   */
  import(table: CsvTable, dialect: NativeDialect, settings: PointSettings): ImportResult<PointInput>;
  import(table: CsvTable, dialect: InstrumentDialect): InstrumentImportResult;
  import(
    table: CsvTable,
    dialect: Dialect,
    settings: PointSettings = DEFAULT_POINT_SETTINGS
  ): ImportResult<PointInput> | InstrumentImportResult {
    return dialect.kind === 'native'
      ? this.importNative(table, settings)
      : this.importInstrument(table, dialect);
  }

  // ---------------------------------------------------------------------------
  // Native
  // ---------------------------------------------------------------------------

  private importNative(
    table: CsvTable,
    settings: PointSettings
  ): ImportResult<PointInput> {
    const result = createResult<PointInput>(table.headers);

    const hasX = NATIVE_FIELD_HEADERS.x.some((h) => table.headers.includes(h));
    const hasY = NATIVE_FIELD_HEADERS.y.some((h) => table.headers.includes(h));
    if (!hasX || !hasY) {
      throw new PointEngineError(
        'Native CSV file must contain x and y columns',
        'MISSING_COLUMNS',
        { required: ['x', 'y'], headers: table.headers }
      );
    }

    table.records.forEach((record, index) => {
      try {
        result.rows.push(this.convertNativeRecord(record, index + 1, settings));
      } catch (e) {
        result.errors.push(describeError(e));
        result.skippedCount++;
      }
    });

    return finalize(result);
  }

  /**
   * Native 레코드 → 포인트 입력
   */
  private convertNativeRecord(
    record: Record<string, string>,
    rowNumber: number,
    settings: PointSettings
  ): PointInput {
    // 1. Name → sampleName / id
    const name = readField(record, 'name');
    const split = name !== undefined ? splitName(name.trim()) : undefined;

    let id = rowNumber;
    if (split?.idText !== undefined) {
      const parsed = parsePositiveInteger(split.idText);
      if (parsed === null) {
        throw malformed(rowNumber, `invalid point ID in Name: ${name}`);
      }
      id = parsed;
    }

    const sampleName =
      split?.sampleName ?? readField(record, 'sampleName') ?? settings.sampleName;

    // 2. 라벨
    const labelText = readField(record, 'label')?.trim();
    const label = labelText ?? settings.label;
    if (!isPointLabel(label)) {
      throw new PointEngineError(
        `Row ${rowNumber}: invalid label ${label}. Use either 'RefMark' or 'Spot'`,
        'INVALID_LABEL',
        { rowNumber, label }
      );
    }

    // 3. 필수 좌표
    const x = parseInteger(readField(record, 'x'));
    const y = parseInteger(readField(record, 'y'));
    if (x === null || y === null) {
      throw malformed(
        rowNumber,
        `x and y must be integers, got (${readField(record, 'x') ?? ''}, ${readField(record, 'y') ?? ''})`
      );
    }

    // 4. 직경 / 스케일 (없으면 기본값, 있으면 숫자여야 함)
    const diameterText = readField(record, 'diameter');
    const diameter =
      diameterText === undefined ? settings.diameter : parsePositiveInteger(diameterText);
    if (diameter === null) {
      throw malformed(rowNumber, `diameter must be a positive integer, got ${diameterText}`);
    }

    const scaleText = readField(record, 'scale');
    const scale = scaleText === undefined ? settings.scale : parseNumber(scaleText);
    if (scale === null || scale <= 0) {
      throw malformed(rowNumber, `scale must be a positive number, got ${scaleText}`);
    }

    return {
      id,
      label,
      x,
      y,
      diameter,
      scale,
      colour: readRaw(record, 'colour') ?? settings.colour,
      sampleName,
      mountName: readRaw(record, 'mountName') ?? settings.mountName,
      material: readRaw(record, 'material') ?? settings.material,
      notes: readRaw(record, 'notes') ?? settings.notes,
    };
  }

  // ---------------------------------------------------------------------------
  // Instrument
  // ---------------------------------------------------------------------------

  private importInstrument(
    table: CsvTable,
    dialect: InstrumentDialect
  ): InstrumentImportResult {
    const required = [
      dialect.idColumn,
      dialect.xColumn,
      dialect.yColumn,
      dialect.labelColumn,
    ];
    const missing = required.filter((h) => !table.headers.includes(h));
    if (missing.length > 0) {
      throw new PointEngineError(
        `The given file does not contain the required headers: ${missing.join(', ')}`,
        'MISSING_COLUMNS',
        { missing, headers: table.headers }
      );
    }

    const result: InstrumentImportResult = {
      ...createResult<InstrumentRow>(table.headers),
      skippedReferenceCount: 0,
    };
    const skip = (isReference: boolean, message: string): void => {
      result.errors.push(message);
      result.skippedCount++;
      if (isReference) {
        result.skippedReferenceCount++;
      }
    };

    table.records.forEach((record, index) => {
      const rowNumber = index + 1;
      const isReference = record[dialect.labelColumn].trim() === dialect.referenceLabel;
      const x = parseNumber(record[dialect.xColumn]);
      const y = parseNumber(record[dialect.yColumn]);
      const id = parsePositiveInteger(record[dialect.idColumn]);

      if (x === null || y === null) {
        skip(
          isReference,
          `Row ${rowNumber}: coordinates must be numeric, got (${record[dialect.xColumn]}, ${record[dialect.yColumn]})`
        );
        return;
      }
      if (!isReference && id === null) {
        skip(
          false,
          `Row ${rowNumber}: point ID must be a positive integer, got ${record[dialect.idColumn]}`
        );
        return;
      }

      result.rows.push({
        rowNumber,
        id,
        isReference,
        x: invertAxis(x, dialect.imageWidth),
        y,
        record: { ...record },
      });
    });

    return finalize(result);
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * X축 원점 반전 (우상단 ↔ 좌상단)
 *
 * 같은 너비로 두 번 적용하면 원래 값
 */
export function invertAxis(x: number, imageWidth: number): number {
  return imageWidth - x;
}

function createResult<T>(headers: string[]): ImportResult<T> {
  return {
    success: false,
    rows: [],
    headers: [...headers],
    errors: [],
    warnings: [],
    skippedCount: 0,
  };
}

function finalize<R extends ImportResult<unknown>>(result: R): R {
  result.success = result.rows.length > 0;
  return result;
}

/**
 * 기본 가져오기 인스턴스
 */
export const importer = new Importer();
