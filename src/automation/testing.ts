import { CrontabRunner } from './types/automation.types';

export class FakeCrontab implements CrontabRunner {
  writes = 0;

  constructor(public content = '') {}

  async read(): Promise<string> {
    return this.content;
  }

  async write(content: string): Promise<void> {
    this.writes += 1;
    this.content = content;
  }
}
