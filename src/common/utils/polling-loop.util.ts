import { Logger } from '@nestjs/common';
import { errorMessage } from './object.util';

/**
 * Runs `tick` every `intervalMs` until stopped. A failing tick is logged and
 * the loop carries on; `stop()` cuts the current sleep short but does not
 * interrupt a tick already in flight.
 */
export class PollingLoop {
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly tick: () => Promise<void>,
    private readonly logger: Logger,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Resolves once the loop has been stopped. */
  async run(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.log(`${this.name} loop started: intervalMs=${this.intervalMs}`);
    while (this.running) {
      try {
        await this.tick();
      } catch (error) {
        this.logger.error(
          `${this.name} iteration failed: ${errorMessage(error)}`,
        );
      }
      await this.sleep();
    }
    this.logger.log(`${this.name} loop stopped`);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private sleep(): Promise<void> {
    if (!this.running) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, this.intervalMs);
    });
  }
}
