/**
 * Recoordination Pipeline
 *
 * 장비 CSV의 좌표를 현재 이미지 좌표계로 변환
 *
 * 흐름:
 * 1. Registry 기준점(RefMark) 3개 이상 확인
 * 2. 장비 파일 파싱 + X축 반전 (대상 이미지 너비 기준)
 * 3. 기준점 행 / 대상 행 분리, 파일 순서 앞 3개 기준점 선택
 * 4. 위치 기반 짝짓기로 아핀 변환 계산
 *    (i번째 파일 기준점 ↔ i번째 Registry 기준점, 이름 매칭 없음)
 * 5. 대상 행 변환 → 새 포인트 생성 → Registry에 일괄 추가
 *
 * 구조적 실패는 Registry를 변경하지 않고 throw
 * 행 단위 실패는 스킵하고 개수를 결과에 기록
 */

import type {
  AnalysisPoint,
  Coordinate,
  ImageSize,
  PointInput,
  PointSettings,
} from '../points/types';
import { PointEngineError } from '../points/errors';
import type { PointRegistry } from '../points/PointRegistry';
import { REQUIRED_REFERENCE_POINTS } from '../points/PointRegistry';
import { createPointInput } from '../points/settings';
import type { InstrumentColumns, InstrumentDialect, InstrumentRow } from '../codec/types';
import { instrumentDialect } from '../codec/types';
import type { Importer } from '../codec/Importer';
import { importer as defaultImporter } from '../codec/Importer';
import type { Exporter } from '../codec/Exporter';
import { exporter as defaultExporter } from '../codec/Exporter';
import type { AffineTransform, IAffineTransformer } from '../transform/types';
import { affineTransformer, pairReferencePoints } from '../transform/AffineTransformer';
import { readTextFile, writeTextFile } from '../io/files';
import { createLogger } from '../utils/logger';

const log = createLogger('Recoordination');

// =============================================================================
// Request / Result
// =============================================================================

/**
 * 재좌표화 요청
 */
export interface RecoordinationRequest {
  /** 장비 CSV 파일 경로 */
  filePath: string;
  /** 새 포인트에 적용할 기본 설정 */
  settings: PointSettings;
  /** 현재 로드된 대상 이미지 크기 */
  imageSize: ImageSize;
  /** 장비 컬럼 설정 (선택적, 기본: DEFAULT_INSTRUMENT_COLUMNS) */
  columns?: Partial<InstrumentColumns>;
}

/**
 * 파일 출력 재좌표화 요청
 */
export interface RecoordinationFileRequest extends Omit<RecoordinationRequest, 'settings'> {
  /** 결과 CSV 파일 경로 */
  outputPath: string;
}

/**
 * 재좌표화 결과
 */
export interface RecoordinationResult {
  /** Registry에 추가된 포인트들 (파일 순서) */
  points: AnalysisPoint[];
  /** 스킵된 행 개수 */
  skippedCount: number;
  /** 행 단위 에러 */
  errors: string[];
  /** 경고 (이미지 범위 밖 포인트 등) */
  warnings: string[];
  /** 계산된 변환 (source → destination) */
  transform: AffineTransform;
}

/**
 * 파일 출력 재좌표화 결과
 */
export interface RecoordinationFileResult {
  /** 출력 파일에 쓴 행 개수 */
  rowCount: number;
  skippedCount: number;
  errors: string[];
  warnings: string[];
  transform: AffineTransform;
}

/**
 * 파이프라인 옵션
 */
export interface RecoordinationPipelineOptions {
  importer?: Importer;
  exporter?: Exporter;
  transformer?: IAffineTransformer;
}

/**
 * 파싱 + 변환 계산까지 끝난 상태
 */
interface PreparedRecoordination {
  dialect: InstrumentDialect;
  headers: string[];
  rows: InstrumentRow[];
  skippedCount: number;
  /** 스킵된 행 중 기준점 행 개수 */
  skippedReferenceCount: number;
  errors: string[];
  transform: AffineTransform;
}

// =============================================================================
// Recoordination Pipeline
// =============================================================================

/**
 * 재좌표화 파이프라인
 */
export class RecoordinationPipeline {
  private readonly importer: Importer;
  private readonly exporter: Exporter;
  private readonly transformer: IAffineTransformer;

  constructor(
    private readonly registry: PointRegistry,
    options: RecoordinationPipelineOptions = {}
  ) {
    this.importer = options.importer ?? defaultImporter;
    this.exporter = options.exporter ?? defaultExporter;
    this.transformer = options.transformer ?? affineTransformer;
  }

  /**
   * 장비 파일의 대상 포인트를 재좌표화해서 Registry에 추가
   *
   * 새 포인트: 라벨 Spot, ID는 파일의 식별자 컬럼, 나머지는 settings
   *
   * @throws PointEngineError (INSUFFICIENT_REFERENCE_POINTS, FILE_ACCESS,
   *   MALFORMED_FILE, MISSING_COLUMNS, DEGENERATE_REFERENCE_SET, MALFORMED_ROW)
   */
  recoordinate(request: RecoordinationRequest): RecoordinationResult {
    const prepared = this.prepare(request);
    const errors = [...prepared.errors];
    let skippedCount = prepared.skippedCount;
    // 대상 행 실패만 (기준점 행 실패 제외)
    let failedTargets = prepared.skippedCount - prepared.skippedReferenceCount;

    // 1. 대상 행 변환 + ID 중복 검사
    const inputs: PointInput[] = [];
    const seen = new Set<number>();

    for (const row of prepared.rows) {
      if (row.isReference || row.id === null) {
        continue;
      }
      if (this.registry.get(row.id) !== undefined || seen.has(row.id)) {
        errors.push(`Row ${row.rowNumber}: analysis point ID already exists: ${row.id}`);
        skippedCount++;
        failedTargets++;
        continue;
      }
      seen.add(row.id);

      const position = this.transformer.apply(prepared.transform, row);
      inputs.push(
        createPointInput(position, { ...request.settings, label: 'Spot' }, row.id)
      );
    }

    // 2. 대상 행이 있었는데 하나도 성공하지 못하면 전체 실패
    if (inputs.length === 0 && failedTargets > 0) {
      throw new PointEngineError(
        `None of the rows in ${request.filePath} could be recoordinated`,
        'MALFORMED_ROW',
        { errors }
      );
    }

    // 3. 일괄 추가 (전부 또는 없음)
    const points = this.registry.addBulk(inputs);
    const warnings = this.boundaryWarnings(points, request.imageSize);

    if (skippedCount > 0) {
      log.warn(`Skipped ${skippedCount} row(s) in ${request.filePath}`);
    }
    log.info(`Recoordinated ${points.length} point(s) from ${request.filePath}`);

    return {
      points,
      skippedCount,
      errors,
      warnings,
      transform: prepared.transform,
    };
  }

  /**
   * 장비 파일의 모든 행을 재좌표화해서 새 장비 CSV로 저장
   *
   * Registry는 변경하지 않음
   * 헤더 순서와 다른 컬럼은 원본 유지, 좌표는 반올림하지 않음
   *
   * @throws PointEngineError (recoordinate와 동일)
   */
  recoordinateToFile(request: RecoordinationFileRequest): RecoordinationFileResult {
    const prepared = this.prepare(request);

    const transformed = prepared.rows.map((row) => ({
      ...row,
      ...this.transformer.applyExact(prepared.transform, row),
    }));

    const csv = this.exporter.toInstrumentCSV(
      prepared.headers,
      transformed,
      prepared.dialect
    );
    writeTextFile(request.outputPath, csv);

    const warnings = this.boundaryWarnings(transformed, request.imageSize);
    log.info(`Saved ${transformed.length} recoordinated row(s) to ${request.outputPath}`);

    return {
      rowCount: transformed.length,
      skippedCount: prepared.skippedCount,
      errors: prepared.errors,
      warnings,
      transform: prepared.transform,
    };
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * 전제조건 확인, 파일 파싱, 변환 계산
   */
  private prepare(
    request: Omit<RecoordinationRequest, 'settings'>
  ): PreparedRecoordination {
    // 1. Registry 기준점 확인
    const destinations = this.registry.referencePoints();
    if (destinations.length < REQUIRED_REFERENCE_POINTS) {
      throw new PointEngineError(
        `There must be at least ${REQUIRED_REFERENCE_POINTS} points labelled 'RefMark' to recoordinate (found ${destinations.length})`,
        'INSUFFICIENT_REFERENCE_POINTS',
        { destCount: destinations.length }
      );
    }

    // 2. 파일 파싱 (X축 반전 포함)
    const dialect = instrumentDialect(request.imageSize.width, request.columns);
    log.info(`Loading instrument CSV: ${request.filePath}`);
    const text = readTextFile(request.filePath);
    const result = this.importer.fromCSV(text, dialect);

    // 3. 파일 순서 앞 3개 기준점 ↔ Registry 삽입 순서 앞 3개 기준점
    const sources = result.rows.filter((row) => row.isReference);
    const correspondences = pairReferencePoints(sources, destinations);

    // 4. 변환 계산
    const transform = this.transformer.fit(correspondences);
    log.debug('Recoordination transform', transform);

    return {
      dialect,
      headers: result.headers,
      rows: result.rows,
      skippedCount: result.skippedCount,
      skippedReferenceCount: result.skippedReferenceCount,
      errors: result.errors,
      transform,
    };
  }

  /**
   * 이미지 범위를 벗어난 포인트 경고
   */
  private boundaryWarnings(points: Coordinate[], imageSize: ImageSize): string[] {
    const outside = points.filter(
      (p) => p.x < 0 || p.y < 0 || p.x > imageSize.width || p.y > imageSize.height
    );
    if (outside.length === 0) {
      return [];
    }

    const message = `${outside.length} recoordinated point(s) go beyond the current image boundary`;
    log.warn(message);
    return [message];
  }
}
