// device-call-pool.ts - Bulkhead that caps concurrent device calls
import { Logger } from '../common/logger';
import { PoolClosedError } from '../common/errors';
import { DeviceInfo, MemoryUsage } from '../types';
import { DeviceLink, LogStream } from './device-link';

interface QueuedCall {
  label: string;
  start: () => void;
  reject: (error: Error) => void;
}

export class DeviceCallPool {
  private logger: Logger;
  private readonly size: number;
  private active = 0;
  private queue: QueuedCall[] = [];
  private closed = false;

  constructor(size: number, logger: Logger) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`Invalid device pool size: ${size}`);
    }
    this.size = size;
    this.logger = logger;
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  run<T>(label: string, fn: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError(label));
    }

    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.active++;
        void Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.drain();
          });
      };

      if (this.active < this.size) {
        start();
      } else {
        this.logger.debug(`Queueing device call: ${label}`, { active: this.active, pending: this.queue.length });
        this.queue.push({ label, start, reject });
      }
    });
  }

  /** Rejects queued calls; calls already running are allowed to finish. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const rejected = this.queue.splice(0, this.queue.length);
    for (const call of rejected) {
      call.reject(new PoolClosedError(call.label));
    }

    if (rejected.length > 0) {
      this.logger.info(`Device call pool closed, ${rejected.length} queued call(s) rejected`);
    }
  }

  private drain(): void {
    while (!this.closed && this.active < this.size) {
      const next = this.queue.shift();
      if (!next) return;
      next.start();
    }
  }
}

/** Routes every DeviceLink call except the log stream through a pool. */
export class PooledDeviceLink implements DeviceLink {
  constructor(private readonly inner: DeviceLink, private readonly pool: DeviceCallPool) {}

  connect(): Promise<boolean> {
    return this.pool.run('connect', () => this.inner.connect());
  }

  disconnect(): Promise<boolean> {
    return this.pool.run('disconnect', () => this.inner.disconnect());
  }

  isConnected(): Promise<boolean> {
    return this.pool.run('isConnected', () => this.inner.isConnected());
  }

  listDevices(): Promise<DeviceInfo[]> {
    return this.pool.run('listDevices', () => this.inner.listDevices());
  }

  getDeviceInfo(): Promise<DeviceInfo | null> {
    return this.pool.run('getDeviceInfo', () => this.inner.getDeviceInfo());
  }

  runCommand(command: string, timeoutMs?: number): Promise<string | null> {
    return this.pool.run(`runCommand ${command}`, () => this.inner.runCommand(command, timeoutMs));
  }

  installPackage(packagePath: string): Promise<boolean> {
    return this.pool.run('installPackage', () => this.inner.installPackage(packagePath));
  }

  isAppInstalled(): Promise<boolean> {
    return this.pool.run('isAppInstalled', () => this.inner.isAppInstalled());
  }

  isAppRunning(): Promise<boolean> {
    return this.pool.run('isAppRunning', () => this.inner.isAppRunning());
  }

  startApp(): Promise<boolean> {
    return this.pool.run('startApp', () => this.inner.startApp());
  }

  forceStopApp(): Promise<boolean> {
    return this.pool.run('forceStopApp', () => this.inner.forceStopApp());
  }

  clearAppData(): Promise<boolean> {
    return this.pool.run('clearAppData', () => this.inner.clearAppData());
  }

  getMemoryUsage(): Promise<MemoryUsage | null> {
    return this.pool.run('getMemoryUsage', () => this.inner.getMemoryUsage());
  }

  sendKeyEvent(keyCode: number): Promise<boolean> {
    return this.pool.run(`sendKeyEvent ${keyCode}`, () => this.inner.sendKeyEvent(keyCode));
  }

  sendTap(x: number, y: number): Promise<boolean> {
    return this.pool.run('sendTap', () => this.inner.sendTap(x, y));
  }

  getScreenDump(): Promise<string | null> {
    return this.pool.run('getScreenDump', () => this.inner.getScreenDump());
  }

  getCurrentActivity(): Promise<string | null> {
    return this.pool.run('getCurrentActivity', () => this.inner.getCurrentActivity());
  }

  openLogStream(): LogStream {
    return this.inner.openLogStream();
  }
}
