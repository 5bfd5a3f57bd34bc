/**
 * Logger
 *
 * console 기반 로거 - 컴포넌트 태그를 앞에 붙임
 * debug는 LASERMAP_DEBUG 환경변수가 있을 때만 출력
 */

type LogArgs = unknown[];

class Logger {
  constructor(private readonly tag: string) {}

  private get isDebug(): boolean {
    return Boolean(process.env.LASERMAP_DEBUG);
  }

  debug(...args: LogArgs): void {
    if (this.isDebug) {
      console.debug(`[${this.tag}]`, ...args);
    }
  }

  info(...args: LogArgs): void {
    console.info(`[${this.tag}]`, ...args);
  }

  warn(...args: LogArgs): void {
    console.warn(`[${this.tag}]`, ...args);
  }

  error(...args: LogArgs): void {
    console.error(`[${this.tag}]`, ...args);
  }
}

export type { Logger };

/**
 * 태그가 붙은 로거 생성
 *
 * @example
 * ```typescript
 * const log = createLogger('PointRegistry');
 * log.warn('Analysis point not found:', id); // [PointRegistry] Analysis point not found: 3
 * ```
 */
export function createLogger(tag: string): Logger {
  return new Logger(tag);
}
