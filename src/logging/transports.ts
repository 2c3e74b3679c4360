/**
 * Logging Transports
 *
 * Text lines look like:
 *   INFO  2026-10-18 14:30:15,042 [tree-assembler] Copied 3 disk images
 */

import winston from 'winston';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time
 */
export function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

export function formatLine(
  level: string,
  message: unknown,
  component: string | undefined,
  date: Date,
  errorStack?: string
): string {
  const componentPart = component ? ` [${component}]` : '';
  let line = `${level.toUpperCase().padEnd(5)} ${formatTimestamp(date)}${componentPart} ${String(message)}`;
  if (errorStack) {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(): winston.Logform.Format {
  return winston.format.printf((info) => {
    const component = typeof info['component'] === 'string' ? info['component'] : undefined;
    const errorStack = typeof info['errorStack'] === 'string' ? info['errorStack'] : undefined;
    return formatLine(info.level, info.message, component, new Date(), errorStack);
  });
}

/**
 * Logs go to stderr so stdout stays reserved for the dry-run listing.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(private format: 'text' | 'json') {}

  createWinstonTransport(): winston.transport {
    const stderrLevels = ['error', 'warn', 'info', 'debug', 'trace'];
    if (this.format === 'json') {
      return new winston.transports.Console({
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        stderrLevels,
      });
    }

    return new winston.transports.Console({
      format: buildTextFormat(),
      stderrLevels,
    });
  }
}

export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: 'text' | 'json'
  ) {}

  createWinstonTransport(): winston.transport {
    const format =
      this.format === 'json'
        ? winston.format.combine(winston.format.timestamp(), winston.format.json())
        : buildTextFormat();

    return new winston.transports.File({
      filename: this.filePath,
      format,
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
