import fs from 'fs';
import os from 'os';
import path from 'path';
import type { PointInput, PointSettings } from '../src/points/types';
import { createPointInput, resolvePointSettings } from '../src/points/settings';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

/**
 * 테스트용 포인트 입력
 */
export function makeInput(
  x: number,
  y: number,
  overrides: Partial<PointSettings> = {},
  id?: number
): PointInput {
  return createPointInput({ x, y }, resolvePointSettings(overrides), id);
}

/**
 * 테스트마다 새 임시 디렉토리
 */
export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'lasermap-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * 로그 출력 숨김
 */
export function silenceConsole(): void {
  jest.spyOn(console, 'info').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'debug').mockImplementation(() => undefined);
}
