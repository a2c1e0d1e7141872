// Type definitions

export const ERROR_KINDS = [
  'app_crash',
  'anr',
  'out_of_memory',
  'network_error',
  'webview_error',
  'profile_error',
  'preferences_error',
  'focus_error',
  'lifecycle_error',
  'permission_error',
  'resource_error',
  'app_not_running',
  'high_memory_usage',
  'potential_memory_leak',
  'missing_ui_element',
  'no_focused_element',
  'unexpected_activity'
] as const;

export type ErrorKind = typeof ERROR_KINDS[number];

export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type Severity = typeof SEVERITIES[number];

export type ErrorSource = 'log' | 'memory' | 'ui' | 'app_state';

export interface DetectedError {
  readonly kind: ErrorKind;
  readonly severity: Severity;
  readonly message: string;
  readonly details: Readonly<Record<string, unknown>>;
  readonly timestamp: number; // epoch ms
  readonly source: ErrorSource;
}

// Wire shape used in reports and outcome details
export interface SerializedError {
  error_type: ErrorKind;
  severity: Severity;
  message: string;
  details: Record<string, unknown>;
  timestamp: number;
  source: ErrorSource;
}

export type RemediationResult = 'success' | 'failed' | 'partial' | 'skipped';

export interface RemediationOutcome {
  readonly action: string;
  readonly result: RemediationResult;
  readonly message: string;
  readonly details: Readonly<{ original_error: SerializedError; error?: string }>;
  readonly timestamp: number; // epoch ms, attempt start
  readonly duration: number; // ms
}

export type AppState = 'settings' | 'loading' | 'error_welcome' | 'browsing' | 'unknown';

export type MonitorStatus = 'initializing' | 'starting' | 'monitoring' | 'stopping' | 'stopped';

export interface MonitoringStats {
  startTime: number;
  totalErrorsDetected: number;
  totalFixesAttempted: number;
  successfulFixes: number;
  failedFixes: number;
  skippedFixes: number;
  currentStatus: MonitorStatus;
  lastErrorTime: number | null;
  lastFixTime: number | null;
}

export interface DeviceInfo {
  deviceId: string;
  state: string;
  model?: string;
  androidVersion?: string;
  apiLevel?: number;
}

export interface MemoryUsage {
  totalPssKb?: number;
  nativeHeapKb?: number;
  dalvikHeapKb?: number;
}

export interface LogBufferEntry {
  timestamp: number;
  line: string;
}

export interface ErrorSummary {
  total_errors: number;
  recent_errors: number;
  error_types: Partial<Record<ErrorKind, number>>;
  severity_counts: Record<Severity, number>;
}

export interface FixStatistics {
  total_fixes: number;
  success_rate: number; // percent
  fix_types: Record<string, { total: number; successful: number }>;
  recent_fixes: number;
}

export function serializeError(error: DetectedError): SerializedError {
  return {
    error_type: error.kind,
    severity: error.severity,
    message: error.message,
    details: { ...error.details },
    timestamp: error.timestamp,
    source: error.source
  };
}
