import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Settings, SETTINGS } from '../../config/settings';
import { AnalyticsReport } from '../types/analytics.types';

const REPORT_PREFIX = 'analytics-';

@Injectable()
export class ReportStorageService {
  private readonly logger = new Logger(ReportStorageService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  get reportsDir(): string {
    return path.join(this.settings.dataDir, 'reports');
  }

  /**
   * `reports/analytics-<date>[-n<id>].json`; a report for the same day is
   * replaced.
   */
  async saveReport(report: AnalyticsReport): Promise<string> {
    const suffix =
      report.newsletter_id != null ? `-n${report.newsletter_id}` : '';
    const filePath = path.join(
      this.reportsDir,
      `${REPORT_PREFIX}${report.generated_at.slice(0, 10)}${suffix}.json`,
    );
    await this.safeWriteJson(filePath, report);
    this.logger.log(`report saved: path=${filePath}`);
    return filePath;
  }

  async loadLatest(): Promise<AnalyticsReport | null> {
    let names: string[];
    try {
      names = await fs.readdir(this.reportsDir);
    } catch {
      return null;
    }
    const latest = names
      .filter(
        (name) => name.startsWith(REPORT_PREFIX) && name.endsWith('.json'),
      )
      .sort()
      .pop();
    return latest ? this.safeReadJson<AnalyticsReport>(
      path.join(this.reportsDir, latest),
    ) : null;
  }

  private async safeReadJson<T>(filePath: string): Promise<T | null> {
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(raw) as T;
    } catch {
      return null;
    }
  }

  private async safeWriteJson(
    filePath: string,
    payload: unknown,
  ): Promise<void> {
    const dir = path.dirname(filePath);
    const tmpPath = path.join(
      dir,
      `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`,
    );

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(
        tmpPath,
        `${JSON.stringify(payload, null, 2)}\n`,
        'utf-8',
      );
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }
}
