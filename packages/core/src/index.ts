/**
 * @lasermap/core
 *
 * 레이저 어블레이션 분석 포인트 관리 + 재좌표화 엔진
 *
 * 책임 범위:
 * - 코어: 포인트 Registry, CSV 코덱, 아핀 변환, 재좌표화, 파일 I/O
 * - 앱: 이미지 표시, 클릭 입력, 테이블 편집 UI
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Points
export * from './points';

// Row codec
export * from './codec';

// Affine transform
export * from './transform';

// Recoordination
export * from './recoordination';

// File I/O
export * from './io';

// Renderers
export * from './renderers';

// Utils
export * from './utils';
