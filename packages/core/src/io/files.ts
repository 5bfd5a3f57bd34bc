/**
 * File access
 *
 * 동기 파일 읽기/쓰기 - 호출이 끝나면 핸들이 남지 않음
 * fs 에러는 FILE_ACCESS 타입의 PointEngineError로 변환
 */

import fs from 'fs';
import path from 'path';
import { PointEngineError } from '../points/errors';

/**
 * 텍스트 파일 읽기 (UTF-8)
 *
 * @throws PointEngineError (FILE_ACCESS)
 */
export function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (e) {
    throw PointEngineError.fromFileError(e, filePath, 'read');
  }
}

/**
 * 텍스트 파일 쓰기 (UTF-8, 덮어쓰기)
 *
 * @throws PointEngineError (FILE_ACCESS)
 */
export function writeTextFile(filePath: string, contents: string): void {
  try {
    fs.writeFileSync(filePath, contents, 'utf8');
  } catch (e) {
    throw PointEngineError.fromFileError(e, filePath, 'write');
  }
}

/**
 * 이미지 내보내기 기본 확장자
 */
export const DEFAULT_IMAGE_EXTENSION = '.png';

/**
 * 이미지 내보내기 경로 결정
 *
 * 확장자가 없으면 .png 추가, 있으면 그대로 사용
 * 코덱 지원 여부는 렌더링 쪽 책임
 *
 * @example
 * ```typescript
 * resolveImageExportPath('out/mount_a');     // 'out/mount_a.png'
 * resolveImageExportPath('out/mount_a.tif'); // 'out/mount_a.tif'
 * ```
 */
export function resolveImageExportPath(filePath: string): string {
  return path.extname(filePath) === '' ? `${filePath}${DEFAULT_IMAGE_EXTENSION}` : filePath;
}
