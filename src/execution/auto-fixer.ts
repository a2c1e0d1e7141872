// auto-fixer.ts - Maps detected errors to remediation sequences on the device
import { Logger } from '../common/logger';
import { Clock, systemClock } from '../common/clock';
import { BoundedHistory } from '../common/bounded-history';
import { describeError, RemediationCancelledError } from '../common/errors';
import { CORE_UI_ELEMENTS, MonitorConfig } from '../config/config';
import { DeviceLink } from '../monitoring/device-link';
import {
  AppState,
  DetectedError,
  ErrorKind,
  FixStatistics,
  RemediationOutcome,
  RemediationResult,
  serializeError
} from '../types';
import { KeyCode } from './key-codes';

export type RemediationPlan =
  | { type: 'restart_app' }
  | { type: 'dismiss_and_restart' }
  | { type: 'memory_restart' }
  | { type: 'trim_memory' }
  | { type: 'refresh_page' }
  | { type: 'refresh_or_restart' }
  | { type: 'open_profiles' }
  | { type: 'reset_app_data' }
  | { type: 'reset_focus' }
  | { type: 'establish_focus' }
  | { type: 'restore_ui' }
  | { type: 'launch_app' }
  | { type: 'navigate_home' };

interface StepOutcome {
  result: RemediationResult;
  message: string;
}

const TRIM_MEMORY_BROADCAST = 'am broadcast -a android.intent.action.TRIM_MEMORY';
const EXPECTED_ABSENCE_STATES: readonly AppState[] = ['settings', 'loading', 'error_welcome'];
const HOUR_MS = 60 * 60 * 1000;

function success(message: string): StepOutcome {
  return { result: 'success', message };
}

function failed(message: string): StepOutcome {
  return { result: 'failed', message };
}

function partial(message: string): StepOutcome {
  return { result: 'partial', message };
}

function skipped(message: string): StepOutcome {
  return { result: 'skipped', message };
}

function ensureActive(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RemediationCancelledError();
  }
}

/** Strategy table. `null` means the kind has no automated remediation. */
export function planRemediation(kind: ErrorKind): RemediationPlan | null {
  switch (kind) {
    case 'app_crash':
    case 'lifecycle_error':
      return { type: 'restart_app' };
    case 'anr':
      return { type: 'dismiss_and_restart' };
    case 'out_of_memory':
    case 'potential_memory_leak':
      return { type: 'memory_restart' };
    case 'high_memory_usage':
      return { type: 'trim_memory' };
    case 'network_error':
      return { type: 'refresh_page' };
    case 'webview_error':
      return { type: 'refresh_or_restart' };
    case 'profile_error':
      return { type: 'open_profiles' };
    case 'preferences_error':
      return { type: 'reset_app_data' };
    case 'focus_error':
      return { type: 'reset_focus' };
    case 'no_focused_element':
      return { type: 'establish_focus' };
    case 'missing_ui_element':
      return { type: 'restore_ui' };
    case 'app_not_running':
      return { type: 'launch_app' };
    case 'unexpected_activity':
      return { type: 'navigate_home' };
    case 'permission_error':
    case 'resource_error':
      return null;
  }
}

export class AutoFixer {
  private device: DeviceLink;
  private logger: Logger;
  private clock: Clock;
  private cooldownMs: number;
  private history: BoundedHistory<RemediationOutcome>;
  private lastAttempt = new Map<ErrorKind, number>();

  constructor(device: DeviceLink, config: MonitorConfig, logger: Logger, clock: Clock = systemClock) {
    this.device = device;
    this.logger = logger;
    this.clock = clock;
    this.cooldownMs = config.fix_cooldown * 1000;
    this.history = new BoundedHistory<RemediationOutcome>(config.max_fix_history);
  }

  public canAttemptFix(kind: ErrorKind): boolean {
    const last = this.lastAttempt.get(kind);
    return last === undefined || this.clock.now() - last >= this.cooldownMs;
  }

  /**
   * Runs the strategy for `error.kind`. Returns null when the kind is in
   * cooldown or has no strategy. An abort of `signal` ends the script at its
   * next step with a `skipped` outcome.
   */
  public async attemptFix(error: DetectedError, signal?: AbortSignal): Promise<RemediationOutcome | null> {
    if (!this.canAttemptFix(error.kind)) {
      this.logger.info(`Fix for ${error.kind} is in cooldown, skipping`);
      return null;
    }

    const plan = planRemediation(error.kind);
    if (!plan) {
      this.logger.warn(`No fix strategy available for ${error.kind}`);
      return null;
    }

    const start = this.clock.now();
    this.logger.info(`Attempting fix for ${error.kind}`, { plan: plan.type });

    let step: StepOutcome;
    let failure: string | undefined;

    try {
      ensureActive(signal);
      step = await this.executePlan(plan, error, signal);
    } catch (err) {
      if (err instanceof RemediationCancelledError) {
        step = skipped(err.message);
        this.logger.info(`Fix for ${error.kind} cancelled`);
      } else {
        failure = describeError(err);
        step = failed(`Fix failed: ${failure}`);
        this.logger.error(`Fix for ${error.kind} threw`, err);
      }
    }

    this.lastAttempt.set(error.kind, start);

    const outcome: RemediationOutcome = Object.freeze({
      action: `fix_${error.kind}`,
      result: step.result,
      message: step.message,
      details: Object.freeze(failure === undefined
        ? { original_error: serializeError(error) }
        : { original_error: serializeError(error), error: failure }),
      timestamp: start,
      duration: this.clock.now() - start
    });

    this.history.push(outcome);
    this.logger.info(`Fix attempt completed: ${outcome.action} -> ${outcome.result}`, {
      message: outcome.message,
      duration_ms: outcome.duration
    });

    return outcome;
  }

  // ============================================
  // STRATEGIES
  // ============================================

  private executePlan(plan: RemediationPlan, error: DetectedError, signal?: AbortSignal): Promise<StepOutcome> {
    switch (plan.type) {
      case 'restart_app':
        return this.restartApp(signal);
      case 'dismiss_and_restart':
        return this.dismissAndRestart(signal);
      case 'memory_restart':
        return this.memoryRestart(signal);
      case 'trim_memory':
        return this.trimMemory(signal);
      case 'refresh_page':
        return this.refreshPage(signal);
      case 'refresh_or_restart':
        return this.refreshOrRestart(signal);
      case 'open_profiles':
        return this.openProfiles(signal);
      case 'reset_app_data':
        return this.resetAppData(signal);
      case 'reset_focus':
        return this.resetFocus(signal);
      case 'establish_focus':
        return this.establishFocus(signal);
      case 'restore_ui':
        return this.restoreUi(error, signal);
      case 'launch_app':
        return this.launchApp(signal);
      case 'navigate_home':
        return this.navigateHome(signal);
    }
  }

  // Scripts stop at the next wait or key press once the signal aborts
  private async wait(ms: number, signal?: AbortSignal): Promise<void> {
    await this.clock.sleep(ms, signal);
    ensureActive(signal);
  }

  private async press(keyCode: number, waitMs: number, signal?: AbortSignal): Promise<void> {
    ensureActive(signal);
    await this.device.sendKeyEvent(keyCode);
    if (waitMs > 0) {
      await this.wait(waitMs, signal);
    }
  }

  private async restartApp(signal?: AbortSignal): Promise<StepOutcome> {
    if (!(await this.device.forceStopApp())) {
      return failed('Failed to force stop app');
    }
    await this.wait(2000, signal);

    if (!(await this.device.startApp())) {
      return failed('Failed to start app');
    }
    await this.wait(5000, signal);

    return (await this.device.isAppRunning())
      ? success('App restarted successfully')
      : failed('App not running after restart');
  }

  private async dismissAndRestart(signal?: AbortSignal): Promise<StepOutcome> {
    await this.press(KeyCode.BACK, 1000, signal);
    return this.restartApp(signal);
  }

  private async memoryRestart(signal?: AbortSignal): Promise<StepOutcome> {
    await this.device.forceStopApp();
    await this.wait(2000, signal);

    await this.device.runCommand('pm trim-caches 1000M');
    await this.wait(2000, signal);

    if (!(await this.device.startApp())) {
      return failed('Failed to restart app after memory cleanup');
    }
    await this.wait(5000, signal);

    return success('App restarted with memory cleanup');
  }

  private async trimMemory(signal?: AbortSignal): Promise<StepOutcome> {
    const running = await this.device.isAppRunning();
    ensureActive(signal);
    if (!running) {
      return this.memoryRestart(signal);
    }

    await this.device.runCommand(TRIM_MEMORY_BROADCAST);
    await this.wait(2000, signal);
    return partial('Memory trim requested');
  }

  private async refreshPage(signal?: AbortSignal): Promise<StepOutcome> {
    if (!(await this.device.isAppRunning())) {
      return failed('App not running, cannot refresh');
    }

    await this.press(KeyCode.DPAD_UP, 500, signal);
    await this.press(KeyCode.DPAD_RIGHT, 500, signal);
    await this.press(KeyCode.DPAD_RIGHT, 500, signal);
    await this.press(KeyCode.DPAD_CENTER, 0, signal);

    return success('Page refresh triggered');
  }

  private async refreshOrRestart(signal?: AbortSignal): Promise<StepOutcome> {
    const refreshed = await this.refreshPage(signal);
    if (refreshed.result === 'success') {
      return success('WebView refreshed');
    }
    ensureActive(signal);
    return this.restartApp(signal);
  }

  private async openProfiles(signal?: AbortSignal): Promise<StepOutcome> {
    if (!(await this.device.isAppRunning())) {
      return failed('App not running, cannot open profiles');
    }

    await this.press(KeyCode.DPAD_UP, 500, signal);
    for (let i = 0; i < 5; i++) {
      await this.press(KeyCode.DPAD_RIGHT, 300, signal);
    }
    await this.press(KeyCode.DPAD_CENTER, 0, signal);

    return partial('Opened profiles screen');
  }

  // Clears the app's storage, saved profiles included
  private async resetAppData(signal?: AbortSignal): Promise<StepOutcome> {
    await this.device.forceStopApp();
    await this.wait(2000, signal);

    if (!(await this.device.clearAppData())) {
      return failed('Failed to clear app data');
    }
    await this.wait(3000, signal);

    if (!(await this.device.startApp())) {
      return failed('Failed to start app after data reset');
    }
    await this.wait(5000, signal);

    return (await this.device.isAppRunning())
      ? success('App data reset and app restarted')
      : failed('App not running after data reset');
  }

  private async resetFocus(signal?: AbortSignal): Promise<StepOutcome> {
    if (!(await this.device.isAppRunning())) {
      return failed('App not running, cannot reset focus');
    }

    await this.press(KeyCode.BACK, 1000, signal);
    await this.press(KeyCode.DPAD_CENTER, 0, signal);

    return partial('Focus reset attempted');
  }

  private async establishFocus(signal?: AbortSignal): Promise<StepOutcome> {
    if (!(await this.device.isAppRunning())) {
      return failed('App not running, cannot establish focus');
    }

    await this.press(KeyCode.DPAD_DOWN, 500, signal);
    await this.press(KeyCode.DPAD_UP, 500, signal);
    await this.press(KeyCode.DPAD_CENTER, 0, signal);

    return partial('Focus establishment attempted');
  }

  private async restoreUi(error: DetectedError, signal?: AbortSignal): Promise<StepOutcome> {
    if (!(await this.device.isAppRunning())) {
      return failed('App not running, cannot restore UI');
    }

    const element = error.details['missing_element'];
    const appState = error.details['app_state'];
    const isCore = typeof element === 'string' && CORE_UI_ELEMENTS.some(core => core === element);

    if (isCore && EXPECTED_ABSENCE_STATES.some(state => state === appState)) {
      return success(`Element ${element} is expected to be absent in state ${String(appState)}`);
    }

    if (isCore && appState === 'browsing') {
      await this.press(KeyCode.BACK, 500, signal);
      await this.press(KeyCode.HOME, 1000, signal);
      await this.press(KeyCode.DPAD_CENTER, 500, signal);
      return partial(`Attempted to restore core element ${element}`);
    }

    await this.press(KeyCode.DPAD_DOWN, 300, signal);
    await this.press(KeyCode.DPAD_UP, 300, signal);
    return partial('Gentle navigation attempted');
  }

  private async launchApp(signal?: AbortSignal): Promise<StepOutcome> {
    if (!(await this.device.startApp())) {
      return failed('Failed to start app');
    }
    await this.wait(5000, signal);

    return (await this.device.isAppRunning())
      ? success('App started successfully')
      : failed('App not running after start');
  }

  private async navigateHome(signal?: AbortSignal): Promise<StepOutcome> {
    for (let i = 0; i < 3; i++) {
      await this.press(KeyCode.BACK, 1000, signal);
    }
    return partial('Navigated back towards main activity');
  }

  // ============================================
  // RECOVERY AND MAINTENANCE
  // ============================================

  /** Full reset path. Ignores cooldown and is not recorded in history. */
  public async emergencyRecovery(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      this.logger.info('Emergency recovery skipped, monitor stopping');
      return false;
    }
    this.logger.critical('Starting emergency recovery');

    try {
      await this.device.forceStopApp();
      await this.wait(3000, signal);

      await this.device.runCommand('pm trim-caches 500M');
      await this.wait(2000, signal);

      if (!(await this.device.isConnected()) && !(await this.device.connect())) {
        this.logger.error('Emergency recovery failed: device unreachable');
        return false;
      }
      ensureActive(signal);

      if (!(await this.device.startApp())) {
        this.logger.error('Emergency recovery failed: app did not start');
        return false;
      }
      await this.wait(10000, signal);

      const running = await this.device.isAppRunning();
      this.logger.info(`Emergency recovery ${running ? 'succeeded' : 'failed'}`);
      return running;
    } catch (error) {
      if (error instanceof RemediationCancelledError) {
        this.logger.info('Emergency recovery cancelled');
        return false;
      }
      this.logger.error('Emergency recovery threw', error);
      return false;
    }
  }

  public async scheduleMaintenance(): Promise<boolean> {
    try {
      this.logger.info('Running scheduled maintenance');
      await this.device.runCommand('pm trim-caches 200M');
      await this.device.runCommand(TRIM_MEMORY_BROADCAST);
      return true;
    } catch (error) {
      this.logger.error('Scheduled maintenance failed', error);
      return false;
    }
  }

  // ============================================
  // HISTORY
  // ============================================

  public getFixHistory(): RemediationOutcome[] {
    return this.history.toArray();
  }

  public countAttemptsSince(timestamp: number): number {
    return this.history.filter(outcome => outcome.timestamp >= timestamp).length;
  }

  public trimHistory(retain: number): void {
    this.history.trimTo(retain);
  }

  public getFixStatistics(): FixStatistics {
    const fixes = this.history.toArray();
    const successful = fixes.filter(fix => fix.result === 'success').length;

    const fixTypes: FixStatistics['fix_types'] = {};
    for (const fix of fixes) {
      const entry = fixTypes[fix.action] ?? { total: 0, successful: 0 };
      entry.total += 1;
      if (fix.result === 'success') entry.successful += 1;
      fixTypes[fix.action] = entry;
    }

    return {
      total_fixes: fixes.length,
      success_rate: fixes.length > 0 ? (successful / fixes.length) * 100 : 0,
      fix_types: fixTypes,
      recent_fixes: this.countAttemptsSince(this.clock.now() - HOUR_MS)
    };
  }
}
