import { Logger, type LogLevel } from '../../app/utils/logger';

export interface CapturedLine {
  level: LogLevel;
  line: string;
}

/**
 * Debug-level logger without timestamps that records every line
 */
export function captureLogger(): { log: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const log = new Logger({
    level: 'debug',
    timestamps: false,
    sink: (level, line) => {
      lines.push({ level, line });
    },
  });
  return { log, lines };
}
