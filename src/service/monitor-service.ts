// monitor-service.ts - Detect, decide, remediate: the monitor's control loop
import { Logger } from '../common/logger';
import { Clock, systemClock } from '../common/clock';
import { BoundedHistory } from '../common/bounded-history';
import { InvalidTransitionError } from '../common/errors';
import { MonitorConfig } from '../config/config';
import { ErrorDetector } from '../detection/error-detector';
import { AutoFixer } from '../execution/auto-fixer';
import { DeviceCallPool, PooledDeviceLink } from '../monitoring/device-call-pool';
import { DeviceLink, LineRead, LogStream } from '../monitoring/device-link';
import {
  DetectedError,
  DeviceInfo,
  LogBufferEntry,
  MonitoringStats,
  MonitorStatus,
  RemediationOutcome,
  SerializedError,
  serializeError
} from '../types';
import { ErrorChannel } from './error-channel';
import { buildReport, writeReport } from './report-writer';

export const STREAM_READ_TIMEOUT_MS = 1000;
export const STREAM_RESTART_DELAY_MS = 5000;
export const STREAM_ERROR_BACKOFF_MS = 1000;
export const HEALTH_ERROR_BACKOFF_MS = 5000;

const HOUR_MS = 60 * 60 * 1000;
const RECENT_ERROR_MINUTES = 5;

export const ALLOWED_TRANSITIONS: Record<MonitorStatus, readonly MonitorStatus[]> = {
  initializing: ['starting', 'stopping'],
  starting: ['monitoring', 'stopping'],
  monitoring: ['stopping'],
  stopping: ['stopped'],
  stopped: []
};

export interface MonitorServiceDeps {
  device: DeviceLink;
  logger: Logger;
  clock?: Clock;
  detector?: ErrorDetector;
  fixer?: AutoFixer;
  pool?: DeviceCallPool;
  /** Install SIGINT/SIGTERM handlers that stop the service. */
  handleSignals?: boolean;
}

export interface StatusSnapshot {
  is_running: boolean;
  stats: MonitoringStats;
  uptime_seconds: number;
  recent_errors: SerializedError[];
  config: MonitorConfig;
}

export class MonitorService {
  private config: MonitorConfig;
  private logger: Logger;
  private clock: Clock;
  private pool: DeviceCallPool;
  private device: DeviceLink;
  private detector: ErrorDetector;
  private fixer: AutoFixer;
  private channel: ErrorChannel;
  private handleSignals: boolean;

  private stats: MonitoringStats;
  private logBuffer: BoundedHistory<LogBufferEntry>;
  private deviceInfo: DeviceInfo | null = null;

  private abortController = new AbortController();
  private activities: Promise<void>[] = [];
  private stopPromise: Promise<void> | null = null;
  private stopped: Promise<void>;
  private markStopped: () => void = () => undefined;
  private signalHandler: (() => void) | null = null;

  constructor(config: MonitorConfig, deps: MonitorServiceDeps) {
    this.config = config;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.pool = deps.pool ?? new DeviceCallPool(config.worker_pool_size, this.logger.child('pool'));
    this.device = new PooledDeviceLink(deps.device, this.pool);
    this.detector = deps.detector ?? new ErrorDetector(config, this.logger.child('detector'), this.clock);
    this.fixer = deps.fixer ?? new AutoFixer(this.device, config, this.logger.child('fixer'), this.clock);
    this.channel = new ErrorChannel((error) => this.processError(error), this.logger);
    this.handleSignals = deps.handleSignals ?? false;

    this.logBuffer = new BoundedHistory<LogBufferEntry>(config.logcat_buffer_size);
    this.stats = {
      startTime: this.clock.now(),
      totalErrorsDetected: 0,
      totalFixesAttempted: 0,
      successfulFixes: 0,
      failedFixes: 0,
      skippedFixes: 0,
      currentStatus: 'initializing',
      lastErrorTime: null,
      lastFixTime: null
    };

    this.stopped = new Promise<void>((resolve) => {
      this.markStopped = resolve;
    });
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  public get status(): MonitorStatus {
    return this.stats.currentStatus;
  }

  private transition(next: MonitorStatus): void {
    const current = this.stats.currentStatus;
    if (!ALLOWED_TRANSITIONS[current].includes(next)) {
      throw new InvalidTransitionError(current, next);
    }
    this.stats.currentStatus = next;
    this.logger.debug(`Status ${current} -> ${next}`);
  }

  public async start(): Promise<boolean> {
    this.transition('starting');
    this.stats.startTime = this.clock.now();

    if (this.handleSignals) {
      this.installSignalHandlers();
    }

    this.logger.info('Starting app monitor', {
      device: `${this.config.device_ip}:${this.config.device_port}`,
      app_package: this.config.app_package
    });

    let connected = false;
    try {
      connected = await this.device.connect();
    } catch (error) {
      this.logger.error('Initial device connection threw', error);
    }

    if (!connected) {
      this.logger.error('Failed to connect to device, monitor not started');
      await this.stop();
      return false;
    }

    try {
      this.deviceInfo = await this.device.getDeviceInfo();
      if (this.deviceInfo) {
        this.logger.info(`Connected to device: ${this.deviceInfo.model ?? 'unknown model'}`, {
          android_version: this.deviceInfo.androidVersion,
          api_level: this.deviceInfo.apiLevel
        });
      }

      if (!(await this.device.isAppInstalled())) {
        this.logger.warn(`App ${this.config.app_package} is not installed on the device`);
      }
    } catch (error) {
      this.logger.warn('Could not inspect device before monitoring', undefined, error);
    }

    // stop() may have run while the device was being inspected
    if (this.status !== 'starting') {
      return false;
    }

    const signal = this.abortController.signal;
    this.activities = [
      this.runLogStream(signal),
      this.runHealthLoop(signal),
      this.runMaintenanceLoop(signal)
    ];

    this.transition('monitoring');
    this.logger.info('Monitoring started');
    return true;
  }

  /** Idempotent. Concurrent callers share one shutdown. */
  public stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  public waitUntilStopped(): Promise<void> {
    return this.stopped;
  }

  private async shutdown(): Promise<void> {
    this.transition('stopping');
    this.logger.info('Stopping app monitor');

    this.abortController.abort();
    await Promise.allSettled(this.activities);
    await this.channel.drain();

    this.generateReport();

    try {
      await this.device.disconnect();
    } catch (error) {
      this.logger.warn('Disconnect failed during shutdown', undefined, error);
    }

    this.pool.close();
    this.removeSignalHandlers();

    this.transition('stopped');
    this.logger.info('App monitor stopped');
    this.markStopped();
  }

  private installSignalHandlers(): void {
    const handler = (): void => {
      this.logger.info('Shutdown signal received');
      this.stop().catch((error: unknown) => this.logger.error('Shutdown failed', error));
    };
    this.signalHandler = handler;
    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);
  }

  private removeSignalHandlers(): void {
    if (!this.signalHandler) return;
    process.off('SIGINT', this.signalHandler);
    process.off('SIGTERM', this.signalHandler);
    this.signalHandler = null;
  }

  // ============================================
  // LOG STREAM
  // ============================================

  private async runLogStream(signal: AbortSignal): Promise<void> {
    this.logger.info('Starting log stream monitoring');

    while (!signal.aborted) {
      let stream: LogStream;
      try {
        stream = this.device.openLogStream();
      } catch (error) {
        this.logger.error('Failed to open log stream', error);
        await this.clock.sleep(STREAM_RESTART_DELAY_MS, signal);
        continue;
      }

      const closeOnAbort = (): void => {
        stream.close().catch((error: unknown) => this.logger.warn('Failed to close log stream', undefined, error));
      };
      signal.addEventListener('abort', closeOnAbort, { once: true });

      try {
        await this.consumeStream(stream, signal);
      } finally {
        signal.removeEventListener('abort', closeOnAbort);
        await stream.close().catch((error: unknown) => this.logger.warn('Failed to close log stream', undefined, error));
      }

      if (!signal.aborted) {
        this.logger.warn('Log stream ended, restarting');
        await this.clock.sleep(STREAM_RESTART_DELAY_MS, signal);
      }
    }
  }

  private async consumeStream(stream: LogStream, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let read: LineRead;
      try {
        read = await stream.nextLine(STREAM_READ_TIMEOUT_MS);
      } catch (error) {
        this.logger.error('Error reading log stream', error);
        await this.clock.sleep(STREAM_ERROR_BACKOFF_MS, signal);
        continue;
      }

      switch (read.kind) {
        case 'timeout':
          continue;
        case 'end':
          return;
        case 'line':
          await this.processLogLine(read.line, signal);
          break;
      }
    }
  }

  private async processLogLine(line: string, signal: AbortSignal): Promise<void> {
    this.logBuffer.push({ timestamp: this.clock.now(), line });
    await this.routeAll(this.detector.analyzeLogLine(line), signal);
  }

  // ============================================
  // HEALTH CHECKS
  // ============================================

  private async runHealthLoop(signal: AbortSignal): Promise<void> {
    this.logger.info('Starting health check loop');

    while (!signal.aborted) {
      try {
        await this.performHealthCheck(signal);
        await this.clock.sleep(this.config.health_check_interval * 1000, signal);
      } catch (error) {
        this.logger.error('Error in health check loop', error);
        await this.clock.sleep(HEALTH_ERROR_BACKOFF_MS, signal);
      }
    }
  }

  /** One probe cycle: connection, app state, memory, then UI. */
  public async performHealthCheck(signal?: AbortSignal): Promise<void> {
    const cancelled = (): boolean => signal?.aborted === true;

    if (cancelled()) return;
    if (!(await this.device.isConnected())) {
      this.logger.warn('Device connection lost, attempting reconnection');
      if (cancelled()) return;
      if (!(await this.device.connect())) {
        this.logger.error('Failed to reconnect to device');
        return;
      }
    }

    if (cancelled()) return;
    const running = await this.device.isAppRunning();
    if (cancelled()) return;
    const activity = await this.device.getCurrentActivity();
    await this.routeAll(this.detector.analyzeAppState(running, activity), signal);

    if (cancelled()) return;
    const memory = await this.device.getMemoryUsage();
    await this.routeAll(this.detector.analyzeMemoryUsage(memory), signal);

    if (cancelled()) return;
    const dump = await this.device.getScreenDump();
    await this.routeAll(this.detector.analyzeUiDump(dump), signal);
  }

  private async routeAll(errors: DetectedError[], signal?: AbortSignal): Promise<void> {
    for (const error of errors) {
      if (signal?.aborted) return;
      await this.channel.submit(error);
    }
  }

  // ============================================
  // MAINTENANCE
  // ============================================

  private async runMaintenanceLoop(signal: AbortSignal): Promise<void> {
    this.logger.info('Starting maintenance loop');

    while (!signal.aborted) {
      await this.clock.sleep(this.config.maintenance_interval * 1000, signal);
      if (signal.aborted) break;

      try {
        await this.performMaintenance();
      } catch (error) {
        this.logger.error('Maintenance error', error);
      }
    }
  }

  public async performMaintenance(): Promise<void> {
    this.logger.info('Performing routine maintenance');

    await this.fixer.scheduleMaintenance();
    await this.refreshDeviceInfo();
    this.generateReport();

    this.detector.trimHistory(this.config.retained_error_history);
    this.fixer.trimHistory(this.config.max_fix_history);
    this.logBuffer.trimTo(this.config.logcat_buffer_size);

    this.logger.info('Maintenance completed');
  }

  // Keeps the last known snapshot when the device does not answer
  private async refreshDeviceInfo(): Promise<void> {
    try {
      const info = await this.device.getDeviceInfo();
      if (info) {
        this.deviceInfo = info;
      }
    } catch (error) {
      this.logger.warn('Could not refresh device info', undefined, error);
    }
  }

  private generateReport(): boolean {
    const report = buildReport({
      now: this.clock.now(),
      stats: this.getStats(),
      errorSummary: this.detector.getErrorSummary(),
      fixStatistics: this.fixer.getFixStatistics(),
      deviceInfo: this.deviceInfo
    });
    return writeReport(this.config.report_file, report, this.logger);
  }

  // ============================================
  // ERROR HANDLING
  // ============================================

  /** Queue an error for the single handler; resolves once it has been handled. */
  public handleDetectedError(error: DetectedError): Promise<void> {
    return this.channel.submit(error);
  }

  private async processError(error: DetectedError): Promise<void> {
    this.stats.totalErrorsDetected++;
    this.stats.lastErrorTime = this.clock.now();
    this.detector.addDetectedError(error);
    this.logger.warn(`Error detected: ${error.kind} (${error.severity})`, { message: error.message });

    if (!this.config.enable_auto_fix || !this.detector.shouldTriggerAutoFix(error)) {
      return;
    }

    const signal = this.abortController.signal;
    if (signal.aborted) {
      this.stats.skippedFixes++;
      this.logger.info(`Monitor stopping, not fixing ${error.kind}`);
      return;
    }

    const recentAttempts = this.fixer.countAttemptsSince(this.clock.now() - HOUR_MS);
    if (recentAttempts >= this.config.max_fix_attempts_per_hour) {
      this.stats.skippedFixes++;
      this.logger.info(`Fix rate limit reached (${recentAttempts}/${this.config.max_fix_attempts_per_hour} per hour), skipping ${error.kind}`);
      return;
    }

    let outcome: RemediationOutcome | null;
    try {
      outcome = await this.fixer.attemptFix(error, signal);
    } catch (err) {
      this.stats.totalFixesAttempted++;
      this.stats.failedFixes++;
      this.stats.lastFixTime = this.clock.now();
      this.logger.error(`Fix attempt for ${error.kind} threw`, err);
      return;
    }

    if (!outcome || outcome.result === 'skipped') {
      this.stats.skippedFixes++;
      return;
    }

    this.stats.totalFixesAttempted++;
    this.stats.lastFixTime = this.clock.now();

    if (outcome.result === 'success') {
      this.stats.successfulFixes++;
      this.logger.info(`Fix successful: ${outcome.message}`);
    } else {
      this.stats.failedFixes++;
      this.logger.warn(`Fix ${outcome.result}: ${outcome.message}`);
    }

    if (error.severity === 'critical' && outcome.result === 'failed' && this.config.enable_emergency_recovery
      && !signal.aborted) {
      this.logger.critical(`Critical fix failed for ${error.kind}, attempting emergency recovery`);
      try {
        const recovered = await this.fixer.emergencyRecovery(signal);
        if (recovered) {
          this.logger.info('Emergency recovery succeeded');
        } else {
          this.logger.critical('Emergency recovery failed');
        }
      } catch (err) {
        this.logger.critical('Emergency recovery threw', err);
      }
    }
  }

  // ============================================
  // QUERIES
  // ============================================

  public getStats(): MonitoringStats {
    return { ...this.stats };
  }

  public getLogBuffer(): LogBufferEntry[] {
    return this.logBuffer.toArray();
  }

  public getDetector(): ErrorDetector {
    return this.detector;
  }

  public getFixer(): AutoFixer {
    return this.fixer;
  }

  public getStatus(): StatusSnapshot {
    return {
      is_running: this.status === 'monitoring',
      stats: this.getStats(),
      uptime_seconds: (this.clock.now() - this.stats.startTime) / 1000,
      recent_errors: this.detector.getRecentErrors(RECENT_ERROR_MINUTES).map(serializeError),
      config: this.config
    };
  }
}
