import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CRONTAB_RUNNER,
  CronJob,
  CrontabRunner,
  STANDARD_JOBS,
} from '../types/automation.types';
import {
  CRON_MARKER,
  formatCronLine,
  parseCronLine,
  validateCronSyntax,
} from '../utils/cron.util';

export const DEFAULT_CLI_COMMAND = 'node dist/cli/main.js';

@Injectable()
export class CronManagerService {
  private readonly logger = new Logger(CronManagerService.name);

  constructor(
    @Inject(CRONTAB_RUNNER) private readonly crontab: CrontabRunner,
  ) {}

  async listJobs(): Promise<string[]> {
    const content = await this.crontab.read();
    return content
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
  }

  /**
   * False when the schedule is invalid or the same job is already installed.
   */
  async addJob(
    schedule: string,
    command: string,
    comment?: string,
  ): Promise<boolean> {
    if (!validateCronSyntax(schedule)) {
      this.logger.warn(`cron job rejected: schedule="${schedule}"`);
      return false;
    }
    const lines = await this.listJobs();
    const normalized = schedule.trim().split(/\s+/).join(' ');
    const exists = lines.some((line) => {
      const job = parseCronLine(line);
      return (
        job !== null && job.schedule === normalized && job.command === command
      );
    });
    if (exists) {
      this.logger.warn(`cron job already installed: command="${command}"`);
      return false;
    }
    await this.writeLines([
      ...lines,
      formatCronLine(normalized, command, comment),
    ]);
    this.logger.log(
      `cron job added: schedule="${normalized}" comment="${comment ?? ''}"`,
    );
    return true;
  }

  /** Removes every line containing `identifier`; false when nothing matched. */
  async removeJob(identifier: string): Promise<boolean> {
    const lines = await this.listJobs();
    const kept = lines.filter((line) => !line.includes(identifier));
    if (kept.length === lines.length) {
      this.logger.warn(`cron job not found: identifier="${identifier}"`);
      return false;
    }
    await this.writeLines(kept);
    return true;
  }

  async getOwnJobs(): Promise<CronJob[]> {
    const lines = await this.listJobs();
    return lines.flatMap((line) => {
      const job = parseCronLine(line);
      return job ? [job] : [];
    });
  }

  /** True when every standard job was installed. */
  async setupStandardJobs(
    projectDir: string = process.cwd(),
    cliCommand: string = DEFAULT_CLI_COMMAND,
  ): Promise<boolean> {
    let success = true;
    for (const job of STANDARD_JOBS) {
      const command = `cd ${projectDir} && ${cliCommand} ${job.subcommand}`;
      if (!(await this.addJob(job.schedule, command, job.description))) {
        this.logger.error(`cron job not installed: name=${job.name}`);
        success = false;
      }
    }
    return success;
  }

  async removeOwnJobs(): Promise<number> {
    const lines = await this.listJobs();
    const kept = lines.filter((line) => !line.includes(CRON_MARKER));
    await this.writeLines(kept);
    const removed = lines.length - kept.length;
    this.logger.log(`cron jobs removed: count=${removed}`);
    return removed;
  }

  private async writeLines(lines: string[]): Promise<void> {
    await this.crontab.write(lines.length ? `${lines.join('\n')}\n` : '');
  }
}
