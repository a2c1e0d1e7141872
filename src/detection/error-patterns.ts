// error-patterns.ts - Log rules for the app under watch
import { ErrorKind, Severity } from '../types';

export type PatternExtractor = (match: RegExpExecArray) => Record<string, unknown>;

export interface ErrorPattern {
  kind: ErrorKind;
  pattern: RegExp;
  severity: Severity;
  extract: PatternExtractor;
}

const CRASH_MARKER = 'FATAL EXCEPTION';
const MAX_CRASH_LINES = 20;

// Lines that make a log entry worth running the full rule set against
export const RELEVANCE_KEYWORDS = ['fatal', 'error', 'exception', 'crash', 'anr'] as const;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const defaultExtract: PatternExtractor = (match) => ({ matched_text: match[0] });

export function extractExceptionType(lines: string[]): string | null {
  for (const line of lines) {
    const match = /(\S*(?:Exception|Error)):/.exec(line);
    if (match) {
      return match[1];
    }
  }
  return null;
}

export const extractCrashInfo: PatternExtractor = (match) => {
  const lines = match.input.split('\n');
  const markerIdx = lines.findIndex(line => line.includes(CRASH_MARKER));
  const start = markerIdx >= 0 ? markerIdx : 0;

  const crashTrace = lines
    .slice(start, start + MAX_CRASH_LINES)
    .filter(line => line.trim().length > 0);

  return {
    crash_trace: crashTrace,
    exception_type: extractExceptionType(crashTrace)
  };
};

function rule(kind: ErrorKind, source: string, severity: Severity, extract: PatternExtractor = defaultExtract): ErrorPattern {
  return { kind, pattern: new RegExp(source, 'im'), severity, extract };
}

/**
 * Ordered rule table. Every rule is evaluated against a relevant line, so one
 * line can produce several errors.
 */
export function buildErrorPatterns(appPackage: string): ErrorPattern[] {
  const pkg = escapeRegExp(appPackage);

  return [
    rule('app_crash', `${CRASH_MARKER}.*${pkg}`, 'critical', extractCrashInfo),
    rule('anr', `ANR in ${pkg}`, 'high', (match) => ({
      anr_text: match[0],
      reason: 'Application not responding'
    })),
    rule('out_of_memory', 'OutOfMemoryError|OOM|Low memory|GC_FOR_ALLOC', 'high'),
    rule('network_error', 'NetworkOnMainThreadException|ConnectException|SocketException|UnknownHostException', 'medium', (match) => ({
      network_error: match[0],
      error_type: 'connectivity'
    })),
    rule('webview_error', 'WebView.*error|onReceivedError|ERR_|Failed to load|net::ERR_', 'medium', (match) => ({
      webview_error: match[0],
      component: 'webview'
    })),
    rule('profile_error', 'ProfileManager.*error|Failed to.*profile|Profile.*not found', 'medium'),
    rule('preferences_error', 'SharedPreferences.*error|Failed to save|Gson.*error', 'low'),
    rule('focus_error', 'Focus.*error|IllegalStateException.*focus|Unable to focus', 'low'),
    rule('lifecycle_error', `${pkg}.*IllegalStateException|Activity.*destroyed|Fragment.*destroyed`, 'medium'),
    rule('permission_error', 'SecurityException|Permission denied|ACCESS_DENIED', 'medium'),
    rule('resource_error', 'ResourceNotFoundException|Unable to find resource|Resources\\$NotFoundException', 'low')
  ];
}
