// errors.ts - Error helpers shared across the monitor

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/** Raised for calls submitted to a device pool that has been closed. */
export class PoolClosedError extends Error {
  constructor(label: string) {
    super(`Device call pool closed, rejected: ${label}`);
    this.name = 'PoolClosedError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Invalid monitor status transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/** Raised inside a remediation script when its signal aborts between steps. */
export class RemediationCancelledError extends Error {
  constructor() {
    super('Fix cancelled: monitor stopping');
    this.name = 'RemediationCancelledError';
  }
}
