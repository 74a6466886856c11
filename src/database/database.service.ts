import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import Database from 'better-sqlite3';
import { BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { Settings, SETTINGS } from '../config/settings';
import { SCHEMA_DDL } from './ddl';
import * as schema from './schema';

export type Db = BetterSQLite3Database<typeof schema>;

export const MEMORY_PATH = ':memory:';

export function resolveSqlitePath(databaseUrl: string): string {
  const trimmed = databaseUrl.trim();
  if (
    trimmed === MEMORY_PATH ||
    trimmed === 'sqlite://' ||
    trimmed === 'sqlite:///:memory:'
  ) {
    return MEMORY_PATH;
  }
  const match = /^sqlite:\/\/\/(.+)$/.exec(trimmed);
  if (!match?.[1]) {
    throw new Error(`unsupported DATABASE_URL: ${databaseUrl}`);
  }
  // sqlite:////abs/path keeps the leading slash, sqlite:///./rel stays relative
  return match[1];
}

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly sqlite: Database.Database;
  readonly db: Db;
  readonly filePath: string;

  constructor(@Inject(SETTINGS) settings: Settings) {
    this.filePath = resolveSqlitePath(settings.databaseUrl);
    if (this.filePath !== MEMORY_PATH) {
      mkdirSync(path.dirname(this.filePath), { recursive: true });
    }

    this.sqlite = new Database(this.filePath);
    this.sqlite.pragma('foreign_keys = ON');
    if (this.filePath !== MEMORY_PATH) {
      this.sqlite.pragma('journal_mode = WAL');
    }
    this.sqlite.exec(SCHEMA_DDL);
    this.db = drizzle(this.sqlite, { schema });
    this.logger.log(`database ready: path=${this.filePath}`);
  }

  ping(): boolean {
    const row: unknown = this.sqlite.prepare('SELECT 1 AS ok').get();
    return (
      typeof row === 'object' && row !== null && 'ok' in row && row.ok === 1
    );
  }

  tableNames(): string[] {
    const rows: unknown[] = this.sqlite
      .prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all();
    return rows
      .map((row) =>
        typeof row === 'object' && row !== null && 'name' in row
          ? String(row.name)
          : '',
      )
      .filter(Boolean);
  }

  vacuum(): void {
    this.sqlite.exec('VACUUM');
    this.sqlite.exec('ANALYZE');
  }

  transaction<T>(work: () => T): T {
    return this.sqlite.transaction(work)();
  }

  onModuleDestroy(): void {
    if (this.sqlite.open) {
      this.sqlite.close();
    }
  }
}
