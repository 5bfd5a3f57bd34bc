/**
 * CSV primitives
 *
 * RFC 4180 형식의 최소 구현
 * - 구분자: 쉼표
 * - 큰따옴표 인용, 내부 큰따옴표는 두 번
 * - CRLF / LF 모두 허용
 */

import { PointEngineError } from '../points/errors';

/**
 * 헤더 + 레코드
 *
 * 레코드는 헤더 이름 → 원본 문자열 값
 */
export interface CsvTable {
  headers: string[];
  records: Array<Record<string, string>>;
}

export type CsvValue = string | number;

/**
 * CSV 텍스트를 행 단위 필드 배열로 분해
 */
function tokenize(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new PointEngineError(
      'CSV file is malformed: a quoted field is never closed',
      'MALFORMED_FILE'
    );
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  // 빈 줄 제거
  return rows.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * CSV 텍스트 파싱
 *
 * @param text - CSV 문자열 (첫 행은 헤더)
 * @returns 헤더와 레코드
 * @throws PointEngineError (MALFORMED_FILE) 헤더 행이 없거나 인용이 닫히지 않을 때
 */
export function parseCsv(text: string): CsvTable {
  const rows = tokenize(text.replace(/^\uFEFF/, ''));

  if (rows.length === 0) {
    throw new PointEngineError('CSV file is empty: a header row is required', 'MALFORMED_FILE');
  }

  const headers = rows[0].map((h) => h.trim());
  const records = rows.slice(1).map((cells) => {
    const record: Record<string, string> = {};
    headers.forEach((header, index) => {
      record[header] = cells[index] ?? '';
    });
    return record;
  });

  return { headers, records };
}

/**
 * 필드 인용 (쉼표, 큰따옴표, 줄바꿈이 있을 때만)
 */
function quote(value: CsvValue): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * CSV 문자열 생성
 *
 * @param headers - 헤더 행
 * @param rows - 헤더 순서와 같은 값 배열들
 * @returns CSV 문자열 (LF 줄바꿈, 마지막 줄바꿈 포함)
 */
export function stringifyCsv(headers: string[], rows: CsvValue[][]): string {
  const lines = [headers, ...rows].map((row) => row.map(quote).join(','));
  return `${lines.join('\n')}\n`;
}
