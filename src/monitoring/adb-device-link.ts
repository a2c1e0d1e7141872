// adb-device-link.ts - DeviceLink over the Android Debug Bridge
import { execFile } from 'child_process';
import { Logger } from '../common/logger';
import { DeviceInfo, MemoryUsage } from '../types';
import { DeviceLink, LogStream } from './device-link';
import { LogcatStream } from './logcat-stream';

export interface ExecResult {
  stdout: string;
  stderr: string;
  success: boolean;
  timedOut: boolean;
}

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<ExecResult>;

export interface AdbDeviceLinkOptions {
  deviceIp: string;
  devicePort: number;
  appPackage: string;
  appActivity: string;
  adbPath?: string;
}

const DEFAULT_COMMAND_TIMEOUT_MS = 30000;
const CONNECT_TIMEOUT_MS = 10000;
const LIST_TIMEOUT_MS = 5000;
const INSTALL_TIMEOUT_MS = 60000;

// Array arguments only: nothing goes through a local shell
export const execFileRunner: CommandRunner = (file, args, timeoutMs) => {
  return new Promise<ExecResult>((resolve) => {
    execFile(
      file,
      args,
      { encoding: 'utf-8', timeout: timeoutMs, windowsHide: true, maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        resolve({
          stdout: stdout || '',
          stderr: stderr || (error ? error.message : ''),
          success: error === null,
          timedOut: error !== null && error.killed === true
        });
      }
    );
  });
};

// ===========================================
// OUTPUT PARSERS
// ===========================================

export function parseDeviceList(output: string): DeviceInfo[] {
  const devices: DeviceInfo[] = [];

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('List of devices') || trimmed.startsWith('*')) continue;

    const parts = trimmed.split('\t');
    if (parts.length >= 2) {
      devices.push({ deviceId: parts[0].trim(), state: parts[1].trim() });
    }
  }

  return devices;
}

function parseColumn(parts: string[], index: number): number | undefined {
  if (parts.length <= index) return undefined;
  const value = parts[index];
  return /^\d+$/.test(value) ? parseInt(value, 10) : undefined;
}

export function parseMemInfo(output: string): MemoryUsage | null {
  const memory: MemoryUsage = {};

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    const parts = trimmed.split(/\s+/);

    if (memory.totalPssKb === undefined) {
      const summary = /TOTAL PSS:\s+(\d+)/.exec(trimmed);
      if (summary) {
        memory.totalPssKb = parseInt(summary[1], 10);
      } else if (parts[0] === 'TOTAL') {
        memory.totalPssKb = parseColumn(parts, 1);
      }
    }

    if (memory.nativeHeapKb === undefined && trimmed.startsWith('Native Heap')) {
      memory.nativeHeapKb = parseColumn(parts, 3);
    }

    if (memory.dalvikHeapKb === undefined && trimmed.startsWith('Dalvik Heap')) {
      memory.dalvikHeapKb = parseColumn(parts, 3);
    }
  }

  const found = memory.totalPssKb !== undefined
    || memory.nativeHeapKb !== undefined
    || memory.dalvikHeapKb !== undefined;

  return found ? memory : null;
}

export function parseCurrentFocus(output: string): string | null {
  const match = /mCurrentFocus=Window\{[^}]*\s(\S+)\/(\S+?)\}/.exec(output);
  return match ? `${match[1]}/${match[2]}` : null;
}

// ===========================================
// ADB DEVICE LINK
// ===========================================

export class AdbDeviceLink implements DeviceLink {
  private logger: Logger;
  private run: CommandRunner;
  private adbPath: string;
  private appPackage: string;
  private appActivity: string;
  readonly deviceId: string;

  constructor(options: AdbDeviceLinkOptions, logger: Logger, run: CommandRunner = execFileRunner) {
    this.logger = logger;
    this.run = run;
    this.adbPath = options.adbPath ?? 'adb';
    this.appPackage = options.appPackage;
    this.appActivity = options.appActivity;
    this.deviceId = `${options.deviceIp}:${options.devicePort}`;
  }

  async connect(): Promise<boolean> {
    const result = await this.run(this.adbPath, ['connect', this.deviceId], CONNECT_TIMEOUT_MS);

    if (result.timedOut) {
      this.logger.warn(`Connection timeout to ${this.deviceId}`);
      return false;
    }

    const output = result.stdout.toLowerCase();
    if (result.success && output.includes('connected') && !output.includes('cannot') && !output.includes('failed')) {
      this.logger.info(`Connected to ${this.deviceId}`);
      return true;
    }

    this.logger.warn(`Failed to connect to ${this.deviceId}`, { stdout: result.stdout.trim(), stderr: result.stderr.trim() });
    return false;
  }

  async disconnect(): Promise<boolean> {
    const result = await this.run(this.adbPath, ['disconnect', this.deviceId], LIST_TIMEOUT_MS);
    this.logger.info(`Disconnected from ${this.deviceId}`);
    return result.success;
  }

  async listDevices(): Promise<DeviceInfo[]> {
    const result = await this.run(this.adbPath, ['devices'], LIST_TIMEOUT_MS);
    if (!result.success) {
      this.logger.warn('Error listing devices', { stderr: result.stderr.trim() });
      return [];
    }
    return parseDeviceList(result.stdout);
  }

  async isConnected(): Promise<boolean> {
    const devices = await this.listDevices();
    return devices.some(device => device.deviceId === this.deviceId && device.state === 'device');
  }

  async runCommand(command: string, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): Promise<string | null> {
    if (!(await this.isConnected()) && !(await this.connect())) {
      return null;
    }

    const result = await this.run(this.adbPath, ['-s', this.deviceId, 'shell', command], timeoutMs);

    if (result.timedOut) {
      this.logger.warn(`Command timeout: ${command}`, { timeout_ms: timeoutMs });
      return null;
    }

    if (!result.success) {
      this.logger.warn(`Command failed: ${command}`, { stderr: result.stderr.trim() });
      return null;
    }

    return result.stdout;
  }

  async getDeviceInfo(): Promise<DeviceInfo | null> {
    const model = await this.runCommand('getprop ro.product.model');
    const androidVersion = await this.runCommand('getprop ro.build.version.release');
    const apiLevel = (await this.runCommand('getprop ro.build.version.sdk'))?.trim();

    if (model === null && androidVersion === null && apiLevel === undefined) {
      return null;
    }

    return {
      deviceId: this.deviceId,
      state: 'device',
      model: model?.trim() || undefined,
      androidVersion: androidVersion?.trim() || undefined,
      apiLevel: apiLevel && /^\d+$/.test(apiLevel) ? parseInt(apiLevel, 10) : undefined
    };
  }

  async installPackage(packagePath: string): Promise<boolean> {
    const result = await this.run(this.adbPath, ['-s', this.deviceId, 'install', '-r', packagePath], INSTALL_TIMEOUT_MS);
    const installed = result.success && result.stdout.includes('Success');
    if (!installed) {
      this.logger.warn(`Install failed: ${packagePath}`, { stderr: result.stderr.trim() });
    }
    return installed;
  }

  async isAppInstalled(): Promise<boolean> {
    const result = await this.runCommand(`pm list packages ${this.appPackage}`);
    return result !== null && result.split('\n').some(line => line.trim() === `package:${this.appPackage}`);
  }

  async isAppRunning(): Promise<boolean> {
    const pid = await this.runCommand(`pidof ${this.appPackage}`);
    if (pid !== null && pid.trim().length > 0) {
      return true;
    }

    const processes = await this.runCommand('ps');
    return processes !== null && processes.includes(this.appPackage);
  }

  async startApp(): Promise<boolean> {
    const result = await this.runCommand(`am start -n ${this.appPackage}/${this.appActivity}`);
    return result !== null && result.includes('Starting');
  }

  async forceStopApp(): Promise<boolean> {
    return (await this.runCommand(`am force-stop ${this.appPackage}`)) !== null;
  }

  async clearAppData(): Promise<boolean> {
    const result = await this.runCommand(`pm clear ${this.appPackage}`);
    return result !== null && result.includes('Success');
  }

  async getMemoryUsage(): Promise<MemoryUsage | null> {
    const result = await this.runCommand(`dumpsys meminfo ${this.appPackage}`);
    return result ? parseMemInfo(result) : null;
  }

  async sendKeyEvent(keyCode: number): Promise<boolean> {
    return (await this.runCommand(`input keyevent ${keyCode}`)) !== null;
  }

  async sendTap(x: number, y: number): Promise<boolean> {
    return (await this.runCommand(`input tap ${x} ${y}`)) !== null;
  }

  async getScreenDump(): Promise<string | null> {
    return this.runCommand('uiautomator dump /dev/tty');
  }

  async getCurrentActivity(): Promise<string | null> {
    const result = await this.runCommand('dumpsys window windows');
    return result ? parseCurrentFocus(result) : null;
  }

  openLogStream(): LogStream {
    return new LogcatStream(this.adbPath, ['-s', this.deviceId, 'logcat'], this.logger.child('logcat'));
  }
}
