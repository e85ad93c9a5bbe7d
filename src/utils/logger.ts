import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

function nowIso(): string {
  return new Date().toISOString();
}

export interface Logger {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

type Level = 'INFO' | 'WARN' | 'ERROR';

export class RunLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly runLabel = 'Scrape run',
    private readonly echo = true,
  ) {}

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', 'utf8');
    await this.append(`=== ${this.runLabel} started ${nowIso()} ===`);
  }

  async info(message: string): Promise<void> {
    await this.write('INFO', message);
  }

  async warn(message: string): Promise<void> {
    await this.write('WARN', message);
  }

  async error(message: string): Promise<void> {
    await this.write('ERROR', message);
  }

  async close(): Promise<void> {
    await this.append(`=== ${this.runLabel} finished ${nowIso()} ===`);
  }

  private async write(level: Level, message: string): Promise<void> {
    if (this.echo) {
      const line = `[${level}] ${message}`;
      if (level === 'ERROR') {
        console.error(line);
      } else if (level === 'WARN') {
        console.warn(line);
      } else {
        console.log(line);
      }
    }
    await this.append(`[${level}] ${message}`);
  }

  private async append(message: string): Promise<void> {
    await appendFile(this.filePath, `${nowIso()} ${message}\n`, 'utf8');
  }
}
