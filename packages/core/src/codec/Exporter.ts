/**
 * Row Exporter
 *
 * 포인트 → CSV 행 변환
 *
 * 책임:
 * - Native: 헤더 이름 변경 + sampleName/id 병합 (Name 컬럼)
 * - Instrument: 원본 헤더 순서 유지, X축을 장비 원점으로 되돌림
 */

import type { AnalysisPoint } from '../points/types';
import type { CsvValue } from './csv';
import { stringifyCsv } from './csv';
import type { InstrumentDialect, InstrumentRow } from './types';
import { NAME_ID_SEPARATOR, NATIVE_HEADERS } from './types';
import { invertAxis } from './Importer';

/**
 * Instrument 파일에 쓰는 좌표의 소수 자릿수
 */
const INSTRUMENT_COORDINATE_DECIMALS = 6;

/**
 * Name 컬럼 값 생성
 *
 * ID는 3자리로 0 패딩 (가져올 때 정수 파싱으로 복원됨)
 *
 * @example
 * ```typescript
 * formatName('sample_x83', 3); // 'sample_x83_#003'
 * ```
 */
export function formatName(sampleName: string, id: number): string {
  return `${sampleName}${NAME_ID_SEPARATOR}${String(id).padStart(3, '0')}`;
}

function roundCoordinate(value: number): number {
  return Number(value.toFixed(INSTRUMENT_COORDINATE_DECIMALS));
}

// =============================================================================
// Exporter Class
// =============================================================================

/**
 * 행 내보내기 클래스
 */
export class Exporter {
  /**
   * Native 헤더
   */
  nativeHeaders(): string[] {
    return [...NATIVE_HEADERS];
  }

  /**
   * 포인트 배열 → Native 행 (헤더 순서)
   */
  toNativeRows(points: AnalysisPoint[]): CsvValue[][] {
    return points.map((p) => [
      formatName(p.sampleName, p.id),
      p.label,
      p.x,
      p.y,
      p.diameter,
      p.scale,
      p.colour,
      p.mountName,
      p.material,
      p.notes,
    ]);
  }

  /**
   * 포인트 배열 → Native CSV 문자열
   */
  toNativeCSV(points: AnalysisPoint[]): string {
    return stringifyCsv(this.nativeHeaders(), this.toNativeRows(points));
  }

  /**
   * Instrument 행 → CSV 문자열
   *
   * 원본 레코드의 다른 컬럼은 그대로 유지
   * 좌표는 반올림하지 않음 (소수 6자리)
   *
   * @param headers - 원본 파일의 헤더 순서
   * @param rows - 좌표가 갱신된 행들 (원점 좌상단)
   * @param dialect - 컬럼 설정 및 이미지 너비
   */
  toInstrumentCSV(
    headers: string[],
    rows: InstrumentRow[],
    dialect: InstrumentDialect
  ): string {
    const values = rows.map((row) => {
      const record: Record<string, CsvValue> = {
        ...row.record,
        [dialect.xColumn]: roundCoordinate(invertAxis(row.x, dialect.imageWidth)),
        [dialect.yColumn]: roundCoordinate(row.y),
      };
      return headers.map((header) => record[header] ?? '');
    });

    return stringifyCsv(headers, values);
  }
}

/**
 * 기본 내보내기 인스턴스
 */
export const exporter = new Exporter();
