import { Injectable } from '@nestjs/common';
import { execFile, spawn } from 'node:child_process';
import { CrontabRunner } from '../types/automation.types';

/** Talks to the `crontab` binary of the current user. */
@Injectable()
export class SystemCrontabRunner implements CrontabRunner {
  read(): Promise<string> {
    return new Promise((resolve, reject) => {
      execFile('crontab', ['-l'], (error, stdout) => {
        if (!error) {
          resolve(stdout);
          return;
        }
        // a non-zero exit means the user has no crontab yet
        if (typeof error.code === 'number') {
          resolve('');
          return;
        }
        reject(error);
      });
    });
  }

  write(content: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn('crontab', ['-'], {
        stdio: ['pipe', 'ignore', 'pipe'],
      });
      let stderr = '';
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      child.on('error', reject);
      child.on('close', (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new Error(`crontab exited with ${code}: ${stderr.trim()}`));
      });
      child.stdin.end(content);
    });
  }
}
