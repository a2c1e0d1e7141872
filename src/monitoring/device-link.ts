// device-link.ts - Capabilities the monitor needs from the device transport
import { DeviceInfo, MemoryUsage } from '../types';

export type LineRead =
  | { kind: 'line'; line: string }
  | { kind: 'timeout' }
  | { kind: 'end' };

/** Continuous line-oriented device log. */
export interface LogStream {
  nextLine(timeoutMs: number): Promise<LineRead>;
  /** Terminates the underlying process. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * Transport failures surface as `false` / `null`, never as rejections, except
 * where a wrapper (such as the device call pool) refuses to schedule a call.
 */
export interface DeviceLink {
  connect(): Promise<boolean>;
  disconnect(): Promise<boolean>;
  isConnected(): Promise<boolean>;
  listDevices(): Promise<DeviceInfo[]>;
  getDeviceInfo(): Promise<DeviceInfo | null>;

  runCommand(command: string, timeoutMs?: number): Promise<string | null>;
  installPackage(packagePath: string): Promise<boolean>;

  isAppInstalled(): Promise<boolean>;
  isAppRunning(): Promise<boolean>;
  startApp(): Promise<boolean>;
  forceStopApp(): Promise<boolean>;
  clearAppData(): Promise<boolean>;
  getMemoryUsage(): Promise<MemoryUsage | null>;

  sendKeyEvent(keyCode: number): Promise<boolean>;
  sendTap(x: number, y: number): Promise<boolean>;
  getScreenDump(): Promise<string | null>;
  getCurrentActivity(): Promise<string | null>;

  openLogStream(): LogStream;
}
