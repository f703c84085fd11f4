export interface LogSnapshot {
  log: string;
  lines: number;
  size: number;
  limit: number;
  truncated: boolean;
  updatedAt: string | null;
}

const DEFAULT_LIMIT_BYTES = 256 * 1024;

/**
 * Rolling in-memory tail of the log, served by `GET /api/logs`.
 */
export class LogBuffer {
  private lines: string[] = [];
  private size = 0;
  private truncated = false;
  private updatedAt: string | null = null;

  constructor(private readonly limit = DEFAULT_LIMIT_BYTES) {}

  public append(rawLine: string): void {
    if (!rawLine) return;
    const line = rawLine.replace(/\r\n/g, '\n').replace(/\n+$/, '');
    this.lines.push(line);
    this.size += Buffer.byteLength(line, 'utf8') + 1;
    while (this.size > this.limit && this.lines.length > 1) {
      const dropped = this.lines.shift() ?? '';
      this.size -= Buffer.byteLength(dropped, 'utf8') + 1;
      this.truncated = true;
    }
    this.updatedAt = new Date().toISOString();
  }

  public snapshot(tail?: number): LogSnapshot {
    const selected =
      typeof tail === 'number' && tail > 0 ? this.lines.slice(-Math.floor(tail)) : this.lines;
    const log = selected.join('\n');
    return {
      log,
      lines: selected.length,
      size: Buffer.byteLength(log, 'utf8'),
      limit: this.limit,
      truncated: this.truncated || selected.length < this.lines.length,
      updatedAt: this.updatedAt,
    };
  }
}

export const logBuffer = new LogBuffer();
