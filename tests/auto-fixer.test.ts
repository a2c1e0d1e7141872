import { resolveConfig, MonitorConfig } from '../src/config/config';
import { AutoFixer, planRemediation } from '../src/execution/auto-fixer';
import { ERROR_KINDS, ErrorKind } from '../src/types';
import { BASE_TIME, FakeDeviceLink, ManualClock, gate, makeError, silentLogger } from './helpers/fakes';

let clock: ManualClock;
let device: FakeDeviceLink;
let fixer: AutoFixer;

function createFixer(config: MonitorConfig = resolveConfig({})): AutoFixer {
  return new AutoFixer(device, config, silentLogger(), clock);
}

beforeEach(() => {
  clock = new ManualClock();
  device = new FakeDeviceLink();
  fixer = createFixer();
});

// ============================================
// STRATEGY TABLE
// ============================================

describe('planRemediation', () => {
  it('has no strategy for permission and resource errors', () => {
    expect(planRemediation('permission_error')).toBeNull();
    expect(planRemediation('resource_error')).toBeNull();
  });

  it('plans every other kind', () => {
    const unplanned: ErrorKind[] = ['permission_error', 'resource_error'];
    for (const kind of ERROR_KINDS.filter(k => !unplanned.includes(k))) {
      expect(planRemediation(kind)).not.toBeNull();
    }
  });

  it('shares the restart plan between crashes and lifecycle errors', () => {
    expect(planRemediation('app_crash')).toEqual({ type: 'restart_app' });
    expect(planRemediation('lifecycle_error')).toEqual({ type: 'restart_app' });
  });
});

// ============================================
// ATTEMPTS
// ============================================

describe('AutoFixer - attemptFix', () => {
  it('restarts the app after a crash', async () => {
    const outcome = await fixer.attemptFix(makeError('app_crash', 'critical'));

    expect(outcome).not.toBeNull();
    expect(outcome?.action).toBe('fix_app_crash');
    expect(outcome?.result).toBe('success');
    expect(outcome?.message).toBe('App restarted successfully');
    expect(outcome?.timestamp).toBe(BASE_TIME);
    expect(outcome?.duration).toBe(7000);
    expect(outcome?.details.original_error.error_type).toBe('app_crash');
    expect(device.calls).toEqual(['forceStopApp', 'startApp', 'isAppRunning']);
    expect(clock.sleeps).toEqual([2000, 5000]);
  });

  it('fails the restart when force stop fails', async () => {
    device.forceStopResult = false;

    const outcome = await fixer.attemptFix(makeError('app_crash', 'critical'));

    expect(outcome?.result).toBe('failed');
    expect(outcome?.message).toBe('Failed to force stop app');
    expect(device.calls).toEqual(['forceStopApp']);
  });

  it('dismisses the dialog before restarting on ANR', async () => {
    const outcome = await fixer.attemptFix(makeError('anr', 'high'));

    expect(outcome?.result).toBe('success');
    expect(device.calls).toEqual(['key:4', 'forceStopApp', 'startApp', 'isAppRunning']);
    expect(clock.sleeps).toEqual([1000, 2000, 5000]);
  });

  it('restarts with a cache trim on out-of-memory', async () => {
    const outcome = await fixer.attemptFix(makeError('out_of_memory', 'high'));

    expect(outcome?.result).toBe('success');
    expect(outcome?.message).toBe('App restarted with memory cleanup');
    expect(device.calls).toEqual(['forceStopApp', 'cmd:pm trim-caches 1000M', 'startApp']);
    expect(clock.sleeps).toEqual([2000, 2000, 5000]);
  });

  it('asks a running app to trim memory on high usage', async () => {
    const outcome = await fixer.attemptFix(makeError('high_memory_usage', 'medium'));

    expect(outcome?.result).toBe('partial');
    expect(device.calls).toEqual(['isAppRunning', 'cmd:am broadcast -a android.intent.action.TRIM_MEMORY']);
    expect(clock.sleeps).toEqual([2000]);
  });

  it('falls back to a memory restart when the app is not running', async () => {
    device.running = false;

    const outcome = await fixer.attemptFix(makeError('high_memory_usage', 'medium'));

    expect(outcome?.result).toBe('success');
    expect(device.calls).toEqual(['isAppRunning', 'forceStopApp', 'cmd:pm trim-caches 1000M', 'startApp']);
  });

  it('refreshes the page on network errors', async () => {
    const outcome = await fixer.attemptFix(makeError('network_error', 'medium'));

    expect(outcome?.result).toBe('success');
    expect(device.keys()).toEqual([19, 22, 22, 23]);
    expect(clock.sleeps).toEqual([500, 500, 500]);
  });

  it('cannot refresh a stopped app', async () => {
    device.running = false;

    const outcome = await fixer.attemptFix(makeError('network_error', 'medium'));

    expect(outcome?.result).toBe('failed');
    expect(device.keys()).toEqual([]);
  });

  it('restarts when a WebView refresh is impossible', async () => {
    device.running = false;

    const outcome = await fixer.attemptFix(makeError('webview_error', 'medium'));

    expect(outcome?.result).toBe('failed');
    expect(outcome?.message).toBe('App not running after restart');
    expect(device.calls).toEqual(['isAppRunning', 'forceStopApp', 'startApp', 'isAppRunning']);
  });

  it('navigates to the profiles button on profile errors', async () => {
    const outcome = await fixer.attemptFix(makeError('profile_error', 'medium'));

    expect(outcome?.result).toBe('partial');
    expect(device.keys()).toEqual([19, 22, 22, 22, 22, 22, 23]);
    expect(clock.sleeps).toEqual([500, 300, 300, 300, 300, 300]);
  });

  it('clears app data on preference errors', async () => {
    const outcome = await fixer.attemptFix(makeError('preferences_error', 'low'));

    expect(outcome?.result).toBe('success');
    expect(device.calls).toEqual(['forceStopApp', 'clearAppData', 'startApp', 'isAppRunning']);
    expect(clock.sleeps).toEqual([2000, 3000, 5000]);
  });

  it('fails a data reset that could not clear storage', async () => {
    device.clearResult = false;

    const outcome = await fixer.attemptFix(makeError('preferences_error', 'low'));

    expect(outcome?.result).toBe('failed');
    expect(outcome?.message).toBe('Failed to clear app data');
    expect(device.calls).toEqual(['forceStopApp', 'clearAppData']);
  });

  it('resets focus with BACK then CENTER', async () => {
    const outcome = await fixer.attemptFix(makeError('focus_error', 'low'));

    expect(outcome?.result).toBe('partial');
    expect(device.keys()).toEqual([4, 23]);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('establishes focus with DOWN, UP, CENTER', async () => {
    const outcome = await fixer.attemptFix(makeError('no_focused_element', 'low'));

    expect(outcome?.result).toBe('partial');
    expect(device.keys()).toEqual([20, 19, 23]);
    expect(clock.sleeps).toEqual([500, 500]);
  });

  it('treats a core element missing in the settings screen as expected', async () => {
    const error = makeError('missing_ui_element', 'low', BASE_TIME, { missing_element: 'webView', app_state: 'settings' });

    const outcome = await fixer.attemptFix(error);

    expect(outcome?.result).toBe('success');
    expect(device.keys()).toEqual([]);
  });

  it('tries to restore a core element missing while browsing', async () => {
    const error = makeError('missing_ui_element', 'low', BASE_TIME, { missing_element: 'webView', app_state: 'browsing' });

    const outcome = await fixer.attemptFix(error);

    expect(outcome?.result).toBe('partial');
    expect(device.keys()).toEqual([4, 3, 23]);
    expect(clock.sleeps).toEqual([500, 1000, 500]);
  });

  it('nudges navigation for other missing elements', async () => {
    const error = makeError('missing_ui_element', 'low', BASE_TIME, { missing_element: 'statusBar', app_state: 'browsing' });

    const outcome = await fixer.attemptFix(error);

    expect(outcome?.result).toBe('partial');
    expect(device.keys()).toEqual([20, 19]);
    expect(clock.sleeps).toEqual([300, 300]);
  });

  it('launches a stopped app', async () => {
    const outcome = await fixer.attemptFix(makeError('app_not_running', 'high'));

    expect(outcome?.result).toBe('success');
    expect(device.calls).toEqual(['startApp', 'isAppRunning']);
    expect(clock.sleeps).toEqual([5000]);
  });

  it('backs out of a foreign activity without verifying', async () => {
    const outcome = await fixer.attemptFix(makeError('unexpected_activity', 'low'));

    expect(outcome?.result).toBe('partial');
    expect(device.calls).toEqual(['key:4', 'key:4', 'key:4']);
    expect(clock.sleeps).toEqual([1000, 1000, 1000]);
  });

  it('returns null without touching the device when no strategy exists', async () => {
    expect(await fixer.attemptFix(makeError('permission_error', 'medium'))).toBeNull();
    expect(device.calls).toEqual([]);
    expect(fixer.getFixHistory()).toEqual([]);
  });

  it('turns a strategy exception into a failed outcome', async () => {
    device.throwOn.add('forceStopApp');

    const outcome = await fixer.attemptFix(makeError('app_crash', 'critical'));

    expect(outcome?.result).toBe('failed');
    expect(outcome?.message).toBe('Fix failed: forceStopApp failed');
    expect(outcome?.details.error).toBe('forceStopApp failed');
    expect(outcome?.details.original_error.error_type).toBe('app_crash');
    expect(fixer.getFixHistory()).toHaveLength(1);
    expect(fixer.canAttemptFix('app_crash')).toBe(false);
  });

  it('stamps outcomes no earlier than the error', async () => {
    const error = makeError('app_not_running', 'high', BASE_TIME);
    clock.advance(250);

    const outcome = await fixer.attemptFix(error);

    expect(outcome?.timestamp).toBe(BASE_TIME + 250);
  });
});

// ============================================
// COOLDOWN
// ============================================

describe('AutoFixer - cancellation', () => {
  it('does not start a fix once the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await fixer.attemptFix(makeError('app_crash', 'critical'), controller.signal);

    expect(outcome?.result).toBe('skipped');
    expect(outcome?.message).toBe('Fix cancelled: monitor stopping');
    expect(device.calls).toEqual([]);
  });

  it('stops a running script after the in-flight device call', async () => {
    const controller = new AbortController();
    const forceStop = gate();
    device.hold.set('forceStopApp', forceStop.promise);

    const pending = fixer.attemptFix(makeError('app_crash', 'critical'), controller.signal);
    controller.abort();
    forceStop.release();
    const outcome = await pending;

    expect(outcome?.result).toBe('skipped');
    expect(device.calls).toEqual(['forceStopApp']);
    expect(clock.sleeps).toEqual([]);
  });

  it('sends no further key presses after an abort', async () => {
    const controller = new AbortController();
    const keyPress = gate();
    device.hold.set('sendKeyEvent', keyPress.promise);

    const pending = fixer.attemptFix(makeError('unexpected_activity', 'low'), controller.signal);
    controller.abort();
    keyPress.release();

    expect((await pending)?.result).toBe('skipped');
    expect(device.keys()).toEqual([4]);
  });

  it('skips emergency recovery once the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await fixer.emergencyRecovery(controller.signal)).toBe(false);
    expect(device.calls).toEqual([]);
  });

  it('abandons emergency recovery midway on abort', async () => {
    const controller = new AbortController();
    const forceStop = gate();
    device.hold.set('forceStopApp', forceStop.promise);

    const pending = fixer.emergencyRecovery(controller.signal);
    controller.abort();
    forceStop.release();

    expect(await pending).toBe(false);
    expect(device.calls).toEqual(['forceStopApp']);
  });
});

describe('AutoFixer - cooldown', () => {
  it('skips a kind attempted less than fix_cooldown seconds ago', async () => {
    await fixer.attemptFix(makeError('app_crash', 'critical'));
    device.calls = [];

    expect(await fixer.attemptFix(makeError('app_crash', 'critical'))).toBeNull();
    expect(device.calls).toEqual([]);
  });

  it('measures the cooldown from the start of the attempt', async () => {
    await fixer.attemptFix(makeError('app_crash', 'critical'));
    // attempt took 7000 ms of virtual time
    clock.advance(52_999);
    expect(fixer.canAttemptFix('app_crash')).toBe(false);

    clock.advance(1);
    expect(fixer.canAttemptFix('app_crash')).toBe(true);
  });

  it('tracks kinds independently', async () => {
    await fixer.attemptFix(makeError('app_crash', 'critical'));
    expect(fixer.canAttemptFix('anr')).toBe(true);
  });

  it('does not start a cooldown on skipped kinds', async () => {
    await fixer.attemptFix(makeError('resource_error', 'low'));
    expect(fixer.canAttemptFix('resource_error')).toBe(true);
  });
});

// ============================================
// RECOVERY AND MAINTENANCE
// ============================================

describe('AutoFixer - emergency recovery', () => {
  it('runs the full reset sequence', async () => {
    expect(await fixer.emergencyRecovery()).toBe(true);

    expect(device.calls).toEqual([
      'forceStopApp',
      'cmd:pm trim-caches 500M',
      'isConnected',
      'startApp',
      'isAppRunning'
    ]);
    expect(clock.sleeps).toEqual([3000, 2000, 10000]);
    expect(fixer.getFixHistory()).toEqual([]);
  });

  it('reconnects a lost device before starting the app', async () => {
    device.connected = false;

    expect(await fixer.emergencyRecovery()).toBe(true);
    expect(device.calls).toContain('connect');
  });

  it('gives up when the device cannot be reached', async () => {
    device.connected = false;
    device.connectResult = false;

    expect(await fixer.emergencyRecovery()).toBe(false);
    expect(device.calls).not.toContain('startApp');
  });

  it('returns false when a step throws', async () => {
    device.throwOn.add('forceStopApp');
    expect(await fixer.emergencyRecovery()).toBe(false);
  });

  it('ignores the cooldown', async () => {
    await fixer.attemptFix(makeError('app_crash', 'critical'));
    expect(await fixer.emergencyRecovery()).toBe(true);
  });
});

describe('AutoFixer - maintenance', () => {
  it('trims caches and broadcasts a memory trim', async () => {
    expect(await fixer.scheduleMaintenance()).toBe(true);
    expect(device.calls).toEqual([
      'cmd:pm trim-caches 200M',
      'cmd:am broadcast -a android.intent.action.TRIM_MEMORY'
    ]);
  });

  it('reports failure when a command throws', async () => {
    device.throwOn.add('runCommand');
    expect(await fixer.scheduleMaintenance()).toBe(false);
  });
});

// ============================================
// HISTORY
// ============================================

describe('AutoFixer - history', () => {
  it('summarises outcomes per action', async () => {
    await fixer.attemptFix(makeError('app_crash', 'critical'));
    device.startResult = false;
    await fixer.attemptFix(makeError('app_not_running', 'high'));

    expect(fixer.getFixStatistics()).toEqual({
      total_fixes: 2,
      success_rate: 50,
      fix_types: {
        fix_app_crash: { total: 1, successful: 1 },
        fix_app_not_running: { total: 1, successful: 0 }
      },
      recent_fixes: 2
    });
  });

  it('reports a zero success rate with no history', () => {
    expect(fixer.getFixStatistics()).toEqual({ total_fixes: 0, success_rate: 0, fix_types: {}, recent_fixes: 0 });
  });

  it('counts attempts since a timestamp', async () => {
    await fixer.attemptFix(makeError('app_not_running', 'high'));
    const second = clock.now();
    await fixer.attemptFix(makeError('unexpected_activity', 'low'));

    expect(fixer.countAttemptsSince(BASE_TIME)).toBe(2);
    expect(fixer.countAttemptsSince(second)).toBe(1);
    expect(fixer.countAttemptsSince(clock.now() + 1)).toBe(0);
  });

  it('caps history at max_fix_history', async () => {
    fixer = createFixer(resolveConfig({ max_fix_history: 2, fix_cooldown: 0 }));

    for (let i = 0; i < 3; i++) {
      await fixer.attemptFix(makeError('unexpected_activity', 'low'));
    }

    expect(fixer.getFixHistory()).toHaveLength(2);
  });

  it('trims history to a retained size', async () => {
    await fixer.attemptFix(makeError('app_not_running', 'high'));
    await fixer.attemptFix(makeError('unexpected_activity', 'low'));

    fixer.trimHistory(1);

    expect(fixer.getFixHistory().map(f => f.action)).toEqual(['fix_unexpected_activity']);
  });
});
