import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { RateLimiter } from '../../src/utils/rate-limiter';

describe('RateLimiter', () => {
  let limiter: RateLimiter;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    limiter = new RateLimiter({ maxRequests: 2, windowMs: 60_000 });
  });

  afterEach(() => {
    limiter.destroy();
    jest.useRealTimers();
  });

  it('deve permitir requisições dentro do limite', () => {
    expect(limiter.checkLimit('user-1')).toMatchObject({ allowed: true, remaining: 1, totalHits: 1 });
    expect(limiter.checkLimit('user-1')).toMatchObject({ allowed: true, remaining: 0, totalHits: 2 });
  });

  it('deve bloquear após o limite e informar a espera', () => {
    limiter.checkLimit('user-1');
    limiter.checkLimit('user-1');

    jest.advanceTimersByTime(15_000);
    const result = limiter.checkLimit('user-1');

    expect(result.allowed).toBe(false);
    expect(result.remaining).toBe(0);
    expect(result.retryAfterSeconds).toBe(45);
  });

  it('deve contar cada usuário separadamente', () => {
    limiter.checkLimit('user-1');
    limiter.checkLimit('user-1');
    expect(limiter.checkLimit('user-2').allowed).toBe(true);
  });

  it('deve liberar após a janela', () => {
    limiter.checkLimit('user-1');
    limiter.checkLimit('user-1');

    jest.advanceTimersByTime(60_000);
    expect(limiter.checkLimit('user-1')).toMatchObject({ allowed: true, totalHits: 1 });
  });
});
