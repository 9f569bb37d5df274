import { describe, it, expect } from 'vitest';
import { LivenessMonitor } from '../src/liveness.js';

describe('LivenessMonitor', () => {
  it('should start idle and never time out while idle', () => {
    const monitor = new LivenessMonitor(1000);

    expect(monitor.state).toBe('idle');
    expect(monitor.check(1_000_000)).toBe('continue');
  });

  it('should arm on collecting and time out strictly after the limit', () => {
    const monitor = new LivenessMonitor(1000);
    monitor.observe({ kind: 'collecting' }, 5000);

    expect(monitor.state).toBe('armed');
    expect(monitor.elapsed(5400)).toBe(400);
    expect(monitor.check(6000)).toBe('continue');
    expect(monitor.check(6001)).toBe('timeout');
    expect(monitor.state).toBe('terminating');
  });

  it('should disarm on saved', () => {
    const monitor = new LivenessMonitor(1000);
    monitor.observe({ kind: 'collecting' }, 0);
    monitor.observe({ kind: 'saved', rows: 5 }, 900);

    expect(monitor.state).toBe('idle');
    expect(monitor.elapsed(5000)).toBeUndefined();
    expect(monitor.check(5000)).toBe('continue');
  });

  it('should re-arm on a new collecting marker', () => {
    const monitor = new LivenessMonitor(1000);
    monitor.observe({ kind: 'collecting' }, 0);
    monitor.observe({ kind: 'collecting' }, 800);

    expect(monitor.check(1500)).toBe('continue');
    expect(monitor.check(1801)).toBe('timeout');
  });

  it('should go idle on start and skip lines and ignore other output', () => {
    const monitor = new LivenessMonitor(1000);
    monitor.observe({ kind: 'collecting' }, 0);
    monitor.observe({ kind: 'other' }, 10);
    expect(monitor.state).toBe('armed');

    monitor.observe({ kind: 'skip' }, 20);
    expect(monitor.state).toBe('idle');

    monitor.observe({ kind: 'collecting' }, 30);
    monitor.observe({ kind: 'start', index: 2, total: 3 }, 40);
    expect(monitor.state).toBe('idle');
  });

  it('should stay terminating until reset', () => {
    const monitor = new LivenessMonitor(10);
    monitor.observe({ kind: 'collecting' }, 0);
    monitor.check(11);
    monitor.observe({ kind: 'saved', rows: 1 }, 12);

    expect(monitor.check(13)).toBe('timeout');
    monitor.reset();
    expect(monitor.state).toBe('idle');
    expect(monitor.check(14)).toBe('continue');
  });

  it('should reject a non-positive timeout', () => {
    expect(() => new LivenessMonitor(0)).toThrow('timeoutMs must be positive');
  });
});
