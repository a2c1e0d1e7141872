#!/usr/bin/env node
// index.ts - kiosk-monitor command line entry point
import * as fs from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { describeError } from './common/errors';
import { Logger, LogLevel, getMonitorLogger, parseLogLevel, readLogTail } from './common/logger';
import { DEFAULT_CONFIG_PATH, MonitorConfig, loadConfig } from './config/config';
import { AdbDeviceLink } from './monitoring/adb-device-link';
import { MonitorService } from './service/monitor-service';
import { readReport } from './service/report-writer';

const VERSION = '1.0.0';

function yes(flag: boolean): string {
  return flag ? chalk.green('yes') : chalk.red('no');
}

function createDevice(config: MonitorConfig, logger: Logger): AdbDeviceLink {
  return new AdbDeviceLink(
    {
      deviceIp: config.device_ip,
      devicePort: config.device_port,
      appPackage: config.app_package,
      appActivity: config.app_activity,
      adbPath: config.adb_path
    },
    logger
  );
}

// Short-lived commands only surface warnings, and never write the daemon's log file
function commandLogger(): Logger {
  return new Logger('cli', null, LogLevel.WARN);
}

function parseLineCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// ============================================
// COMMANDS
// ============================================

async function runMonitor(config: MonitorConfig): Promise<void> {
  const logger = getMonitorLogger(config.log_file, parseLogLevel(config.log_level));
  const device = createDevice(config, logger.child('adb'));
  const service = new MonitorService(config, { device, logger, handleSignals: true });

  if (!(await service.start())) {
    console.error(chalk.red('Monitor failed to start, see log for details'));
    process.exitCode = 1;
    return;
  }

  console.log(chalk.green('Monitoring started, press Ctrl+C to stop'));
  await service.waitUntilStopped();
}

async function checkStatus(config: MonitorConfig): Promise<void> {
  const device = createDevice(config, commandLogger());

  console.log(chalk.bold('App Status Check'));
  console.log('='.repeat(40));
  console.log(`Connecting to ${device.deviceId}...`);

  if (!(await device.connect())) {
    console.log(chalk.red('ADB connection failed'));
    process.exitCode = 1;
    return;
  }
  console.log(chalk.green('ADB connection successful'));

  const info = await device.getDeviceInfo();
  if (info) {
    console.log(`Device: ${info.model ?? 'unknown'}`);
    console.log(`Android: ${info.androidVersion ?? 'unknown'} (API ${info.apiLevel ?? '?'})`);
  }

  const installed = await device.isAppInstalled();
  const running = await device.isAppRunning();
  const activity = await device.getCurrentActivity();

  console.log(`App installed: ${yes(installed)}`);
  console.log(`App running: ${yes(running)}`);
  if (activity) {
    console.log(`Current activity: ${activity}`);
  }

  if (running) {
    const memory = await device.getMemoryUsage();
    if (memory?.totalPssKb !== undefined) {
      console.log(`Memory usage: ${(memory.totalPssKb / 1024).toFixed(1)} MB`);
    }
  }

  const report = readReport(config.report_file);
  if (report) {
    console.log(`Last report: ${report.timestamp}`);
  }
}

async function testConnection(config: MonitorConfig): Promise<void> {
  const device = createDevice(config, commandLogger());

  console.log(chalk.bold('ADB Connection Test'));
  console.log('='.repeat(40));
  console.log(`Connecting to ${device.deviceId}...`);

  if (!(await device.connect())) {
    console.log(chalk.red('Connection failed'));
    process.exitCode = 1;
    return;
  }
  console.log(chalk.green('Connection successful'));

  console.log('Testing device responsiveness...');
  const listed = (await device.listDevices()).find(d => d.deviceId === device.deviceId);
  if (!listed) {
    console.log(chalk.red('Device not found in device list'));
    process.exitCode = 1;
    return;
  }
  console.log(chalk.green(`Device found: ${listed.state}`));

  console.log('Testing command execution...');
  const output = await device.runCommand('echo test');
  if (output?.includes('test')) {
    console.log(chalk.green('Command execution successful'));
    console.log(chalk.green('\nConnection test completed'));
  } else {
    console.log(chalk.red('Command execution failed'));
    process.exitCode = 1;
  }
}

function showConfig(config: MonitorConfig): void {
  console.log(chalk.bold('Monitor Configuration'));
  console.log('='.repeat(30));
  console.log(JSON.stringify(config, null, 2));
}

function showLogs(config: MonitorConfig, lines: number): void {
  if (!fs.existsSync(config.log_file)) {
    console.log(chalk.red(`Monitor log file not found: ${config.log_file}`));
    return;
  }

  console.log(chalk.bold(`Last ${lines} log entries`));
  console.log('='.repeat(40));
  for (const line of readLogTail(config.log_file, lines)) {
    console.log(line);
  }
}

function showReport(config: MonitorConfig): void {
  const report = readReport(config.report_file);
  if (!report) {
    console.log(chalk.red('Monitor report not found'));
    console.log('Run the monitor first to generate a report');
    return;
  }

  const stats = report.statistics;
  console.log(chalk.bold('Monitoring Report'));
  console.log('='.repeat(25));
  console.log(`Uptime: ${report.uptime_seconds.toFixed(0)} seconds`);
  console.log(`Total errors: ${stats.total_errors_detected}`);
  console.log(`Fix attempts: ${stats.total_fixes_attempted}`);
  console.log(`Successful fixes: ${stats.successful_fixes}`);
  console.log(`Failed fixes: ${stats.failed_fixes}`);
  console.log(`Skipped fixes: ${stats.skipped_fixes}`);

  if (stats.total_fixes_attempted > 0) {
    const rate = (stats.successful_fixes / stats.total_fixes_attempted) * 100;
    console.log(`Fix success rate: ${rate.toFixed(1)}%`);
  }

  const errorTypes = Object.entries(report.error_summary.error_types);
  if (report.error_summary.recent_errors > 0 && errorTypes.length > 0) {
    console.log(chalk.bold('\nRecent Error Types:'));
    for (const [kind, count] of errorTypes) {
      console.log(`  - ${kind}: ${count}`);
    }
  }

  console.log(`\nReport generated: ${report.timestamp}`);
}

// ============================================
// PROGRAM
// ============================================

const program = new Command();

program
  .name('kiosk-monitor')
  .description('Watches a kiosk app over ADB and repairs it when it misbehaves')
  .version(VERSION)
  .option('-c, --config <path>', 'configuration file', DEFAULT_CONFIG_PATH);

function currentConfig(): MonitorConfig {
  const options = program.opts<{ config: string }>();
  return loadConfig(options.config);
}

program
  .command('start')
  .description('start the monitoring daemon')
  .action(async () => runMonitor(currentConfig()));

program
  .command('status')
  .description('check app and device status')
  .action(async () => checkStatus(currentConfig()));

program
  .command('test')
  .description('test the ADB connection')
  .action(async () => testConnection(currentConfig()));

program
  .command('config')
  .description('show the effective configuration')
  .action(() => showConfig(currentConfig()));

program
  .command('logs')
  .description('show recent log entries')
  .option('-n, --lines <count>', 'number of lines to show', parseLineCount, 20)
  .action((options: { lines: number }) => showLogs(currentConfig(), options.lines));

program
  .command('report')
  .description('show the last monitoring report')
  .action(() => showReport(currentConfig()));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exit(1);
});
