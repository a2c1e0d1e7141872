// report-writer.ts - Periodic monitoring report persisted as JSON
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../common/logger';
import { DeviceInfo, ErrorSummary, FixStatistics, MonitoringStats } from '../types';

export interface SerializedStats {
  start_time: string;
  total_errors_detected: number;
  total_fixes_attempted: number;
  successful_fixes: number;
  failed_fixes: number;
  skipped_fixes: number;
  current_status: string;
  last_error_time: string | null;
  last_fix_time: string | null;
}

export interface MonitorReport {
  timestamp: string;
  uptime_seconds: number;
  statistics: SerializedStats;
  error_summary: ErrorSummary;
  fix_statistics: FixStatistics;
  device_info: DeviceInfo | null;
}

export interface ReportInput {
  now: number;
  stats: MonitoringStats;
  errorSummary: ErrorSummary;
  fixStatistics: FixStatistics;
  deviceInfo: DeviceInfo | null;
}

// Only the fields the CLI reads back are checked
export const StoredReportSchema = z.object({
  timestamp: z.string().default('Unknown'),
  uptime_seconds: z.number().default(0),
  statistics: z.object({
    total_errors_detected: z.number().default(0),
    total_fixes_attempted: z.number().default(0),
    successful_fixes: z.number().default(0),
    failed_fixes: z.number().default(0),
    skipped_fixes: z.number().default(0)
  }).default({}),
  error_summary: z.object({
    recent_errors: z.number().default(0),
    error_types: z.record(z.string(), z.number()).default({})
  }).default({})
});

export type StoredReport = z.infer<typeof StoredReportSchema>;

function toIso(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}

export function serializeStats(stats: MonitoringStats): SerializedStats {
  return {
    start_time: new Date(stats.startTime).toISOString(),
    total_errors_detected: stats.totalErrorsDetected,
    total_fixes_attempted: stats.totalFixesAttempted,
    successful_fixes: stats.successfulFixes,
    failed_fixes: stats.failedFixes,
    skipped_fixes: stats.skippedFixes,
    current_status: stats.currentStatus,
    last_error_time: toIso(stats.lastErrorTime),
    last_fix_time: toIso(stats.lastFixTime)
  };
}

export function buildReport(input: ReportInput): MonitorReport {
  return {
    timestamp: new Date(input.now).toISOString(),
    uptime_seconds: (input.now - input.stats.startTime) / 1000,
    statistics: serializeStats(input.stats),
    error_summary: input.errorSummary,
    fix_statistics: input.fixStatistics,
    device_info: input.deviceInfo
  };
}

export function writeReport(reportFile: string, report: MonitorReport, logger: Logger): boolean {
  try {
    const dir = path.dirname(reportFile);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(reportFile, JSON.stringify(report, null, 2), 'utf-8');
    logger.info(`Generated monitoring report: ${reportFile}`);
    return true;
  } catch (error) {
    logger.error(`Failed to write report: ${reportFile}`, error);
    return false;
  }
}

/** Returns null when the file is absent. Throws on unreadable or malformed content. */
export function readReport(reportFile: string): StoredReport | null {
  if (!fs.existsSync(reportFile)) {
    return null;
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(reportFile, 'utf-8'));
  return StoredReportSchema.parse(parsed);
}
