// logcat-stream.ts - Long-lived `adb logcat` process read line by line
import { spawn, ChildProcess } from 'child_process';
import * as readline from 'readline';
import { Logger } from '../common/logger';
import { LineRead, LogStream } from './device-link';

const MAX_PENDING_LINES = 5000;
const KILL_GRACE_MS = 2000;

/**
 * Buffers lines pushed by a producer and hands them to a single consumer,
 * one `next()` at a time, with a per-read timeout.
 */
export class LineQueue {
  private pending: string[] = [];
  private ended = false;
  private waiter: ((read: LineRead) => void) | null = null;
  private dropped = 0;

  constructor(private readonly maxPending: number = MAX_PENDING_LINES) {}

  get droppedCount(): number {
    return this.dropped;
  }

  get size(): number {
    return this.pending.length;
  }

  push(line: string): void {
    if (this.ended) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ kind: 'line', line });
      return;
    }

    this.pending.push(line);
    if (this.pending.length > this.maxPending) {
      this.pending.shift();
      this.dropped++;
    }
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ kind: 'end' });
    }
  }

  next(timeoutMs: number): Promise<LineRead> {
    const line = this.pending.shift();
    if (line !== undefined) {
      return Promise.resolve({ kind: 'line', line });
    }
    if (this.ended) {
      return Promise.resolve({ kind: 'end' });
    }
    if (this.waiter) {
      return Promise.reject(new Error('LineQueue supports a single reader'));
    }

    return new Promise<LineRead>((resolve) => {
      const timer = setTimeout(() => {
        if (this.waiter === settle) {
          this.waiter = null;
        }
        resolve({ kind: 'timeout' });
      }, timeoutMs);

      const settle = (read: LineRead): void => {
        clearTimeout(timer);
        resolve(read);
      };

      this.waiter = settle;
    });
  }
}

export class LogcatStream implements LogStream {
  private logger: Logger;
  private child: ChildProcess;
  private queue = new LineQueue();
  private exited: Promise<void>;
  private hasExited = false;

  constructor(command: string, args: string[], logger: Logger) {
    this.logger = logger;
    this.child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

    this.exited = new Promise<void>((resolve) => {
      this.child.once('exit', (code, signal) => {
        this.hasExited = true;
        this.logger.info('Logcat process exited', { code, signal });
        resolve();
      });
      this.child.once('error', (error) => {
        this.hasExited = true;
        this.logger.warn('Logcat process failed', { command }, error);
        this.queue.end();
        resolve();
      });
    });

    if (this.child.stdout) {
      const rl = readline.createInterface({ input: this.child.stdout, crlfDelay: Infinity });
      rl.on('line', (line) => {
        const trimmed = line.trim();
        if (trimmed) this.queue.push(trimmed);
      });
      rl.on('close', () => this.queue.end());
    } else {
      this.queue.end();
    }

    this.child.stderr?.on('data', (chunk: Buffer) => {
      this.logger.debug('logcat stderr', { output: chunk.toString('utf-8').trim() });
    });
  }

  nextLine(timeoutMs: number): Promise<LineRead> {
    return this.queue.next(timeoutMs);
  }

  async close(): Promise<void> {
    this.queue.end();

    if (this.hasExited) {
      return;
    }

    this.child.kill('SIGTERM');
    const killTimer = setTimeout(() => {
      if (!this.hasExited) {
        this.child.kill('SIGKILL');
      }
    }, KILL_GRACE_MS);

    await this.exited;
    clearTimeout(killTimer);

    if (this.queue.droppedCount > 0) {
      this.logger.warn('Logcat lines dropped while the reader was busy', { dropped: this.queue.droppedCount });
    }
  }
}
