import { Logger } from '@nestjs/common';
import { FakeCrontab } from '../testing';
import { CronManagerService } from './cron-manager.service';

describe('CronManagerService', () => {
  let crontab: FakeCrontab;
  let manager: CronManagerService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    crontab = new FakeCrontab('0 1 * * * /usr/bin/backup\n');
    manager = new CronManagerService(crontab);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('installs the standard jobs next to existing entries', async () => {
    await expect(manager.setupStandardJobs('/srv/app')).resolves.toBe(true);

    expect(crontab.content).toBe(
      [
        '0 1 * * * /usr/bin/backup',
        '0 * * * * cd /srv/app && node dist/cli/main.js fetch-content # newsletter-engine Fetch content from all sources',
        '*/5 * * * * cd /srv/app && node dist/cli/main.js process-scheduled # newsletter-engine Process scheduled newsletter sends',
        '0 3 * * * cd /srv/app && node dist/cli/main.js daily-maintenance # newsletter-engine Daily maintenance tasks',
        '0 9 * * 1 cd /srv/app && node dist/cli/main.js generate-report # newsletter-engine Weekly analytics report',
        '',
      ].join('\n'),
    );
    expect((await manager.getOwnJobs()).map((job) => job.schedule)).toEqual([
      '0 * * * *',
      '*/5 * * * *',
      '0 3 * * *',
      '0 9 * * 1',
    ]);
  });

  it('reports a partial install when a job is already present', async () => {
    await manager.setupStandardJobs('/srv/app');
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    await expect(manager.setupStandardJobs('/srv/app')).resolves.toBe(false);
    expect(await manager.getOwnJobs()).toHaveLength(4);
  });

  it('rejects invalid schedules without touching the crontab', async () => {
    await expect(manager.addJob('61 * * * *', '/usr/bin/true')).resolves.toBe(
      false,
    );
    expect(crontab.writes).toBe(0);
  });

  it('removes jobs by identifier', async () => {
    await manager.addJob('*/10 * * * *', '/usr/bin/true', 'Ping');

    await expect(manager.removeJob('/usr/bin/true')).resolves.toBe(true);
    await expect(manager.removeJob('/usr/bin/missing')).resolves.toBe(false);
    expect(crontab.content).toBe('0 1 * * * /usr/bin/backup\n');
  });

  it('removes only its own jobs', async () => {
    await manager.setupStandardJobs('/srv/app');

    await expect(manager.removeOwnJobs()).resolves.toBe(4);
    expect(await manager.listJobs()).toEqual(['0 1 * * * /usr/bin/backup']);
  });
});
