import * as fs from 'fs';
import { z } from 'zod';
import { describeError } from '../common/errors';

export const CORE_UI_ELEMENTS = ['profilesButton', 'webView', 'browserToolbar'] as const;

const FocusMonitoringSchema = z.object({
  enabled: z.boolean().default(true),
  ignore_in_states: z.array(z.string()).default(['loading'])
});

const UiMonitoringSchema = z.object({
  state_aware_checking: z.boolean().default(true),
  strict_element_checking: z.boolean().default(false),
  expected_elements_by_state: z.record(z.string(), z.array(z.string())).default({
    browsing: [...CORE_UI_ELEMENTS]
  }),
  ignore_missing_elements_in_states: z.array(z.string()).default(['settings', 'loading', 'error_welcome']),
  focus_monitoring: FocusMonitoringSchema.default({})
});

export const MonitorConfigSchema = z.object({
  device_ip: z.string().min(1).default('192.168.1.100'),
  device_port: z.number().int().min(1).max(65535).default(5555),
  adb_path: z.string().min(1).default('adb'),
  app_package: z.string().min(1).default('com.webviewer.firetv'),
  app_activity: z.string().min(1).default('com.webviewer.firetv.MainActivity'),

  logcat_buffer_size: z.number().int().positive().default(1000),
  health_check_interval: z.number().positive().default(30), // seconds
  maintenance_interval: z.number().positive().default(3600), // seconds

  max_fix_attempts_per_hour: z.number().int().nonnegative().default(10),
  fix_cooldown: z.number().nonnegative().default(60), // seconds
  max_error_history: z.number().int().positive().default(1000),
  retained_error_history: z.number().int().nonnegative().default(500),
  max_fix_history: z.number().int().positive().default(200),
  worker_pool_size: z.number().int().positive().default(3),

  enable_auto_fix: z.boolean().default(true),
  enable_emergency_recovery: z.boolean().default(true),

  log_level: z.string().default('INFO'),
  log_file: z.string().min(1).default('monitor.log'),
  report_file: z.string().min(1).default('monitor_report.json'),

  ui_monitoring: UiMonitoringSchema.default({})
});

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;
export type UiMonitoringConfig = z.infer<typeof UiMonitoringSchema>;

export const DEFAULT_CONFIG_PATH = 'monitor.config.json';

export function defaultConfig(): MonitorConfig {
  return MonitorConfigSchema.parse({});
}

/**
 * Merge a raw settings document over the defaults. Unknown keys are dropped.
 * Throws a ZodError when a known key has the wrong shape.
 */
export function resolveConfig(raw: unknown): MonitorConfig {
  return MonitorConfigSchema.parse(raw ?? {});
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): MonitorConfig {
  if (!fs.existsSync(configPath)) {
    console.warn(`No config file found at ${configPath}, using defaults`);
    return defaultConfig();
  }

  try {
    const configFile = fs.readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(configFile);
    const result = MonitorConfigSchema.safeParse(parsed);

    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
      console.warn(`WARNING: Invalid config in ${configPath}, using defaults\n  ${issues.join('\n  ')}`);
      return defaultConfig();
    }

    return result.data;
  } catch (error) {
    console.warn(`Error loading config ${configPath}: ${describeError(error)}, using defaults`);
    return defaultConfig();
  }
}
