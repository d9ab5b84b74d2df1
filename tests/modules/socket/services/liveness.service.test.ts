/**
 * Liveness Monitor Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LivenessMonitor } from '@/modules/socket/services';

describe('LivenessMonitor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  function createMonitor(heartbeatIntervalMs = 1000, timeoutMultiple = 2) {
    const onIdle = vi.fn();
    const onTimeout = vi.fn();
    const monitor = new LivenessMonitor({ heartbeatIntervalMs, timeoutMultiple }, { onIdle, onTimeout });
    return { monitor, onIdle, onTimeout };
  }

  it('should derive timeout and check interval from the heartbeat interval', () => {
    expect(createMonitor(30000, 2).monitor.timeoutMs).toBe(60000);
    expect(createMonitor(30000, 2).monitor.checkIntervalMs).toBe(15000);
    expect(createMonitor(100, 3).monitor.checkIntervalMs).toBe(250);
  });

  it('should ping once after an idle interval', () => {
    const { monitor, onIdle, onTimeout } = createMonitor();
    monitor.start();

    vi.advanceTimersByTime(1500);

    expect(onIdle).toHaveBeenCalledTimes(1);
    expect(onTimeout).not.toHaveBeenCalled();
    monitor.stop();
  });

  it('should time out once with the idle duration', () => {
    const { monitor, onTimeout } = createMonitor();
    monitor.start();

    vi.advanceTimersByTime(5000);

    expect(onTimeout).toHaveBeenCalledTimes(1);
    expect(onTimeout).toHaveBeenCalledWith(2000);

    vi.advanceTimersByTime(5000);
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('should restart the window on activity', () => {
    const { monitor, onIdle, onTimeout } = createMonitor();
    monitor.start();

    vi.advanceTimersByTime(1000);
    expect(onIdle).toHaveBeenCalledTimes(1);

    monitor.touch();
    vi.advanceTimersByTime(1500);

    expect(onIdle).toHaveBeenCalledTimes(2);
    expect(onTimeout).not.toHaveBeenCalled();
    monitor.stop();
  });

  it('should not fire after stop', () => {
    const { monitor, onIdle, onTimeout } = createMonitor();
    monitor.start();
    monitor.stop();

    vi.advanceTimersByTime(10000);

    expect(onIdle).not.toHaveBeenCalled();
    expect(onTimeout).not.toHaveBeenCalled();
  });

  it('should evaluate an explicit instant', () => {
    const { monitor, onTimeout } = createMonitor();
    const last = monitor.getLastActivity();

    monitor.check(last + 1999);
    expect(onTimeout).not.toHaveBeenCalled();

    monitor.check(last + 2000);
    expect(onTimeout).toHaveBeenCalledWith(2000);
  });
});
