import { collectSystemStats, usage } from './system-stats.util';

describe('system stats', () => {
  it('derives used space and percentage', () => {
    expect(usage(8 * 1024 ** 3, 2 * 1024 ** 3)).toEqual({
      total_gb: 8,
      used_gb: 6,
      percent: 75,
    });
    expect(usage(0, 0)).toEqual({ total_gb: 0, used_gb: 0, percent: 0 });
  });

  it('reports memory and cpu for this host', async () => {
    const stats = await collectSystemStats('/path/that/does/not/exist');

    expect(stats.disk).toBeNull();
    expect(stats.cpu.cores).toBeGreaterThan(0);
    expect(stats.memory.total_gb).toBeGreaterThan(0);
  });
});
