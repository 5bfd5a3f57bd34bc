/**
 * Native CSV files
 *
 * Native 방언 파일 가져오기/내보내기
 */

import type { AnalysisPoint, PointInput, PointSettings } from '../points/types';
import { PointEngineError } from '../points/errors';
import type { PointRegistry } from '../points/PointRegistry';
import { importer } from '../codec/Importer';
import { exporter } from '../codec/Exporter';
import { NATIVE_DIALECT } from '../codec/types';
import { readTextFile, writeTextFile } from './files';
import { createLogger } from '../utils/logger';

const log = createLogger('NativeFiles');

/**
 * Native 가져오기 요약
 */
export interface NativeImportSummary {
  /** 추가된 포인트들 (파일 순서) */
  points: AnalysisPoint[];
  /** 스킵된 행 개수 */
  skippedCount: number;
  /** 행 단위 에러 */
  errors: string[];
}

/**
 * 이미 존재하는 ID의 행을 걸러냄 (Registry + 파일 내 중복)
 */
function partitionByUniqueId(
  rows: PointInput[],
  taken: (id: number) => boolean
): { unique: PointInput[]; errors: string[] } {
  const seen = new Set<number>();
  const unique: PointInput[] = [];
  const errors: string[] = [];

  for (const row of rows) {
    if (row.id !== undefined && (taken(row.id) || seen.has(row.id))) {
      errors.push(`Analysis point ID already exists: ${row.id}`);
      continue;
    }
    if (row.id !== undefined) {
      seen.add(row.id);
    }
    unique.push(row);
  }

  return { unique, errors };
}

/**
 * Native CSV 파일을 Registry로 가져오기
 *
 * 유효한 행은 한 번에 추가 (전부 또는 없음)
 * 유효한 행이 하나도 없으면 실패
 *
 * @throws PointEngineError (FILE_ACCESS, MALFORMED_FILE, MISSING_COLUMNS, MALFORMED_ROW)
 */
export function importNativeFile(
  registry: PointRegistry,
  filePath: string,
  settings: PointSettings
): NativeImportSummary {
  const text = readTextFile(filePath);
  const result = importer.fromCSV(text, NATIVE_DIALECT, settings);

  const { unique, errors } = partitionByUniqueId(
    result.rows,
    (id) => registry.get(id) !== undefined
  );
  if (unique.length === 0) {
    throw new PointEngineError(
      `No valid analysis points found in ${filePath}`,
      'MALFORMED_ROW',
      { errors: [...result.errors, ...errors] }
    );
  }

  const points = registry.addBulk(unique);
  const skippedCount = result.skippedCount + errors.length;

  if (skippedCount > 0) {
    log.warn(`Skipped ${skippedCount} row(s) while importing ${filePath}`);
  }
  log.info(`Imported ${points.length} analysis point(s) from ${filePath}`);

  return { points, skippedCount, errors: [...result.errors, ...errors] };
}

/**
 * 포인트들을 Native CSV 파일로 내보내기
 *
 * @throws PointEngineError (FILE_ACCESS)
 */
export function exportNativeFile(filePath: string, points: AnalysisPoint[]): void {
  writeTextFile(filePath, exporter.toNativeCSV(points));
  log.info(`Exported ${points.length} analysis point(s) to ${filePath}`);
}
