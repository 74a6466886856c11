import { Logger } from '@nestjs/common';
import { PollingLoop } from './polling-loop.util';

describe('PollingLoop', () => {
  const logger = new Logger('PollingLoopSpec');

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('keeps ticking after a failed iteration until stopped', async () => {
    const errorSpy = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    let calls = 0;
    const loop: PollingLoop = new PollingLoop(
      'test',
      1,
      async () => {
        calls += 1;
        if (calls === 1) {
          throw new Error('boom');
        }
        if (calls === 3) {
          loop.stop();
        }
      },
      logger,
    );

    await loop.run();

    expect(calls).toBe(3);
    expect(loop.isRunning).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith('test iteration failed: boom');
  });

  it('wakes a sleeping loop on stop', async () => {
    let calls = 0;
    const loop = new PollingLoop(
      'slow',
      60_000,
      async () => {
        calls += 1;
      },
      logger,
    );

    const finished = loop.run();
    await Promise.resolve();
    loop.stop();
    await finished;

    expect(calls).toBe(1);
  });
});
