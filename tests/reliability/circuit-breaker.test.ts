import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createCircuitBreaker } from '../../src/reliability/circuit-breaker';
import { CircuitState } from '../../src/reliability/types';
import type { CircuitBreakerConfig } from '../../src/reliability/types';
import { createSilentLogger } from '../helpers';

const config: CircuitBreakerConfig = {
  failureThreshold: 5,
  cooldownMs: 60000,
};

function tripped(threshold: number = config.failureThreshold) {
  const breaker = createCircuitBreaker({ ...config, failureThreshold: threshold }, createSilentLogger());
  for (let i = 0; i < threshold; i++) {
    breaker.reportFailure();
  }
  return breaker;
}

describe('CircuitBreaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('closed state', () => {
    it('should start closed and let calls through', () => {
      const breaker = createCircuitBreaker(config, createSilentLogger());

      expect(breaker.getStats().state).toBe(CircuitState.CLOSED);
      expect(breaker.getStats().consecutiveFailures).toBe(0);
      expect(breaker.checkOpen()).toEqual({ allowed: true, probe: false });
    });

    it('should track consecutive failures', () => {
      const breaker = createCircuitBreaker(config, createSilentLogger());

      for (let i = 1; i <= 4; i++) {
        breaker.reportFailure();
        expect(breaker.getStats().consecutiveFailures).toBe(i);
      }
      expect(breaker.getStats().state).toBe(CircuitState.CLOSED);
    });

    it('should reset failure count on success', () => {
      const breaker = createCircuitBreaker(config, createSilentLogger());

      breaker.reportFailure();
      breaker.reportFailure();
      breaker.reportSuccess();

      expect(breaker.getStats().consecutiveFailures).toBe(0);
      expect(breaker.getStats().state).toBe(CircuitState.CLOSED);
    });
  });

  describe('open state', () => {
    it('should block after exactly threshold consecutive failures', () => {
      const breaker = createCircuitBreaker(config, createSilentLogger());

      for (let i = 0; i < 4; i++) {
        breaker.reportFailure();
      }
      expect(breaker.checkOpen().allowed).toBe(true);

      breaker.reportFailure();

      expect(breaker.checkOpen()).toEqual({ allowed: false, retryAfterMs: 60000 });
      const stats = breaker.getStats();
      expect(stats.state).toBe(CircuitState.OPEN);
      expect(stats.openedAt).toBe(Date.now());
    });

    it('should stay blocked while the cooldown has not elapsed', () => {
      const breaker = tripped();

      expect(breaker.checkOpen().allowed).toBe(false);
      vi.advanceTimersByTime(30000);

      expect(breaker.checkOpen()).toEqual({ allowed: false, retryAfterMs: 30000 });
      vi.advanceTimersByTime(29999);
      expect(breaker.isOpen()).toBe(true);
    });

    it('should report the remaining cooldown in stats without side effects', () => {
      const breaker = tripped();
      vi.advanceTimersByTime(20000);

      expect(breaker.getStats()).toMatchObject({ state: CircuitState.OPEN, retryAfterMs: 40000 });

      vi.advanceTimersByTime(40000);
      expect(breaker.getStats()).toMatchObject({
        state: CircuitState.HALF_OPEN,
        retryAfterMs: 0,
        probeInFlight: false,
      });
      expect(breaker.checkOpen()).toEqual({ allowed: true, probe: true });
    });

    it('should ignore a late success while open', () => {
      const breaker = tripped();

      breaker.reportSuccess();

      expect(breaker.getStats().state).toBe(CircuitState.OPEN);
    });
  });

  describe('half-open state', () => {
    it('should let exactly one probe through after the cooldown', () => {
      const breaker = tripped();

      vi.advanceTimersByTime(60000);

      expect(breaker.checkOpen()).toEqual({ allowed: true, probe: true });
      expect(breaker.getStats().state).toBe(CircuitState.HALF_OPEN);
      expect(breaker.getStats().openedAt).toBeUndefined();

      // Concurrent callers while the probe is in flight
      expect(breaker.checkOpen()).toEqual({ allowed: false, retryAfterMs: 0 });
      expect(breaker.checkOpen()).toEqual({ allowed: false, retryAfterMs: 0 });
    });

    it('should close on a successful probe', () => {
      const breaker = tripped();
      vi.advanceTimersByTime(60000);
      breaker.checkOpen();

      breaker.reportSuccess();

      const stats = breaker.getStats();
      expect(stats.state).toBe(CircuitState.CLOSED);
      expect(stats.consecutiveFailures).toBe(0);
      expect(stats.probeInFlight).toBe(false);
      expect(breaker.checkOpen()).toEqual({ allowed: true, probe: false });
    });

    it('should reopen with a fresh cooldown on a failed probe', () => {
      const breaker = tripped();
      vi.advanceTimersByTime(60000);
      breaker.checkOpen();
      const reopenedAt = Date.now();

      breaker.reportFailure();

      const stats = breaker.getStats();
      expect(stats.state).toBe(CircuitState.OPEN);
      expect(stats.openedAt).toBe(reopenedAt);
      expect(breaker.checkOpen()).toEqual({ allowed: false, retryAfterMs: 60000 });

      vi.advanceTimersByTime(60000);
      expect(breaker.checkOpen()).toEqual({ allowed: true, probe: true });
    });

    it('should hand the probe to the next caller once released', () => {
      const breaker = tripped();
      vi.advanceTimersByTime(60000);
      breaker.checkOpen();

      breaker.releaseProbe();

      expect(breaker.checkOpen()).toEqual({ allowed: true, probe: true });
    });
  });

  describe('configuration', () => {
    it('should respect a custom failure threshold', () => {
      const breaker = createCircuitBreaker({ failureThreshold: 10, cooldownMs: 60000 }, createSilentLogger());

      for (let i = 0; i < 9; i++) {
        breaker.reportFailure();
      }
      expect(breaker.getStats().state).toBe(CircuitState.CLOSED);

      breaker.reportFailure();
      expect(breaker.getStats().state).toBe(CircuitState.OPEN);
    });

    it('should respect a custom cooldown', () => {
      const breaker = createCircuitBreaker({ failureThreshold: 1, cooldownMs: 30000 }, createSilentLogger());
      breaker.reportFailure();

      vi.advanceTimersByTime(29999);
      expect(breaker.getStats().state).toBe(CircuitState.OPEN);

      vi.advanceTimersByTime(1);
      expect(breaker.getStats().state).toBe(CircuitState.HALF_OPEN);
    });
  });
});
