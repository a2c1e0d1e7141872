// error-detector.ts - Turns log lines, probes and UI dumps into typed errors
import { Logger } from '../common/logger';
import { Clock, systemClock } from '../common/clock';
import { BoundedHistory } from '../common/bounded-history';
import { CORE_UI_ELEMENTS, MonitorConfig, UiMonitoringConfig } from '../config/config';
import {
  AppState,
  DetectedError,
  ErrorKind,
  ErrorSource,
  ErrorSummary,
  MemoryUsage,
  Severity
} from '../types';
import { ErrorPattern, RELEVANCE_KEYWORDS, buildErrorPatterns } from './error-patterns';

export const HIGH_MEMORY_THRESHOLD_KB = 500000;
export const MEMORY_LEAK_GROWTH_FACTOR = 1.5;

const ESCALATION_WINDOW_MINUTES = 10;
const ESCALATION_REPEAT_THRESHOLD = 3;
const SUMMARY_WINDOW_MINUTES = 60;

const SETTINGS_MARKERS = ['SettingsActivity', 'ProfilesActivity', 'ProfileEditActivity'];
const HIDDEN_MARKER = 'visibility="gone"';
const FOCUSED_MARKER = 'focused="true"';

// ============================================
// PURE HELPERS
// ============================================

export function detectAppState(uiDump: string): AppState {
  if (SETTINGS_MARKERS.some(marker => uiDump.includes(marker))) {
    return 'settings';
  }

  const lower = uiDump.toLowerCase();
  if (lower.includes('loading') || lower.includes('progress')) {
    return 'loading';
  }

  const hidden = uiDump.includes(HIDDEN_MARKER);

  if (uiDump.includes('welcomeContainer') && !hidden) {
    return 'error_welcome';
  }

  if (uiDump.includes('webViewCard') && !hidden) {
    return 'browsing';
  }

  return 'unknown';
}

export function getExpectedElements(appState: AppState, ui: UiMonitoringConfig): string[] {
  if (!ui.state_aware_checking) {
    return [...CORE_UI_ELEMENTS];
  }

  let expected = ui.expected_elements_by_state[appState] ?? [];

  if (ui.ignore_missing_elements_in_states.includes(appState)) {
    expected = [];
  }

  if (ui.strict_element_checking && appState === 'browsing') {
    expected = [...CORE_UI_ELEMENTS];
  }

  return [...expected];
}

/**
 * Escalation policy. `history` must already contain `error` when it has been
 * recorded, so the third medium error of a kind within the window escalates.
 */
export function shouldEscalate(error: DetectedError, history: readonly DetectedError[], now: number): boolean {
  switch (error.severity) {
    case 'critical':
    case 'high':
      return true;
    case 'medium': {
      const cutoff = now - ESCALATION_WINDOW_MINUTES * 60 * 1000;
      const similar = history.filter(e => e.kind === error.kind && e.timestamp >= cutoff);
      return similar.length >= ESCALATION_REPEAT_THRESHOLD;
    }
    case 'low':
      return false;
  }
}

function titleCase(kind: ErrorKind): string {
  return kind
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

// ============================================
// ERROR DETECTOR
// ============================================

export class ErrorDetector {
  private logger: Logger;
  private clock: Clock;
  private appPackage: string;
  private ui: UiMonitoringConfig;
  private patterns: ErrorPattern[];
  private history: BoundedHistory<DetectedError>;
  private expectedActivities: string[];
  private lastMemoryUsageKb: number | null = null;

  constructor(config: MonitorConfig, logger: Logger, clock: Clock = systemClock) {
    this.logger = logger;
    this.clock = clock;
    this.appPackage = config.app_package;
    this.ui = config.ui_monitoring;
    this.patterns = buildErrorPatterns(config.app_package);
    this.history = new BoundedHistory<DetectedError>(config.max_error_history);
    this.expectedActivities = ['MainActivity', 'SettingsActivity', 'ProfilesActivity', 'ProfileEditActivity']
      .map(activity => `${config.app_package}.${activity}`);
  }

  private createError(
    kind: ErrorKind,
    severity: Severity,
    message: string,
    details: Record<string, unknown>,
    source: ErrorSource
  ): DetectedError {
    return Object.freeze({
      kind,
      severity,
      message,
      details: Object.freeze(details),
      timestamp: this.clock.now(),
      source
    });
  }

  private isRelevant(line: string): boolean {
    if (line.includes(this.appPackage)) return true;
    const lower = line.toLowerCase();
    return RELEVANCE_KEYWORDS.some(keyword => lower.includes(keyword));
  }

  // ============================================
  // LOG STREAM
  // ============================================

  public analyzeLogLine(line: string): DetectedError[] {
    if (!this.isRelevant(line)) {
      return [];
    }

    try {
      const detected: DetectedError[] = [];

      for (const rule of this.patterns) {
        const match = rule.pattern.exec(line);
        if (!match) continue;

        detected.push(this.createError(
          rule.kind,
          rule.severity,
          `${titleCase(rule.kind)} detected`,
          rule.extract(match),
          'log'
        ));
      }

      return detected;
    } catch (error) {
      this.logger.warn('Dropping log line that failed to classify', { line: line.slice(0, 200) }, error);
      return [];
    }
  }

  // ============================================
  // PROBES
  // ============================================

  public analyzeMemoryUsage(memory: MemoryUsage | null): DetectedError[] {
    if (!memory) {
      return [];
    }

    try {
      const detected: DetectedError[] = [];
      const totalPss = memory.totalPssKb ?? 0;

      if (totalPss > HIGH_MEMORY_THRESHOLD_KB) {
        detected.push(this.createError(
          'high_memory_usage',
          'medium',
          `High memory usage detected: ${totalPss}KB`,
          { memory_usage_kb: totalPss, threshold_kb: HIGH_MEMORY_THRESHOLD_KB },
          'memory'
        ));
      }

      // Single previous sample, no smoothing: prone to false positives after restarts
      const previous = this.lastMemoryUsageKb;
      if (previous !== null && previous > 0 && totalPss > previous * MEMORY_LEAK_GROWTH_FACTOR) {
        detected.push(this.createError(
          'potential_memory_leak',
          'high',
          `Potential memory leak: ${previous}KB -> ${totalPss}KB`,
          {
            previous_usage_kb: previous,
            current_usage_kb: totalPss,
            increase_percentage: ((totalPss - previous) * 100) / previous
          },
          'memory'
        ));
      }

      this.lastMemoryUsageKb = totalPss;
      return detected;
    } catch (error) {
      this.logger.warn('Dropping memory sample that failed to classify', undefined, error);
      return [];
    }
  }

  public analyzeUiDump(uiDump: string | null): DetectedError[] {
    if (!uiDump) {
      return [];
    }

    try {
      const detected: DetectedError[] = [];
      const appState = detectAppState(uiDump);
      const expectedElements = getExpectedElements(appState, this.ui);

      for (const element of expectedElements) {
        if (!uiDump.includes(element)) {
          detected.push(this.createError(
            'missing_ui_element',
            'low',
            `Missing UI element: ${element} (state: ${appState})`,
            { missing_element: element, app_state: appState, expected_elements: expectedElements },
            'ui'
          ));
        }
      }

      const focus = this.ui.focus_monitoring;
      if (focus.enabled && !focus.ignore_in_states.includes(appState) && !uiDump.includes(FOCUSED_MARKER)) {
        detected.push(this.createError(
          'no_focused_element',
          'low',
          `No focused UI element detected (state: ${appState})`,
          { app_state: appState },
          'ui'
        ));
      }

      return detected;
    } catch (error) {
      this.logger.warn('Dropping UI dump that failed to classify', undefined, error);
      return [];
    }
  }

  public analyzeAppState(isRunning: boolean, currentActivity: string | null): DetectedError[] {
    const detected: DetectedError[] = [];

    if (!isRunning) {
      detected.push(this.createError(
        'app_not_running',
        'high',
        'App is not running when it should be',
        { expected_state: 'running', actual_state: 'stopped' },
        'app_state'
      ));
    }

    if (currentActivity && !this.expectedActivities.some(activity => currentActivity.includes(activity))) {
      detected.push(this.createError(
        'unexpected_activity',
        'low',
        `App in unexpected activity: ${currentActivity}`,
        { current_activity: currentActivity, expected_activities: [...this.expectedActivities] },
        'app_state'
      ));
    }

    return detected;
  }

  // ============================================
  // HISTORY
  // ============================================

  public addDetectedError(error: DetectedError): void {
    this.history.push(error);
    this.logger.error(`Detected ${error.severity} error: ${error.kind} - ${error.message}`);
  }

  public getErrorHistory(): DetectedError[] {
    return this.history.toArray();
  }

  public getRecentErrors(minutes: number = 5): DetectedError[] {
    const cutoff = this.clock.now() - minutes * 60 * 1000;
    return this.history.filter(error => error.timestamp >= cutoff);
  }

  public trimHistory(retain: number): void {
    this.history.trimTo(retain);
  }

  public getErrorSummary(): ErrorSummary {
    const recent = this.getRecentErrors(SUMMARY_WINDOW_MINUTES);

    const summary: ErrorSummary = {
      total_errors: this.history.length,
      recent_errors: recent.length,
      error_types: {},
      severity_counts: { low: 0, medium: 0, high: 0, critical: 0 }
    };

    for (const error of recent) {
      summary.error_types[error.kind] = (summary.error_types[error.kind] ?? 0) + 1;
      summary.severity_counts[error.severity] += 1;
    }

    return summary;
  }

  public shouldTriggerAutoFix(error: DetectedError): boolean {
    return shouldEscalate(error, this.history.toArray(), this.clock.now());
  }
}
