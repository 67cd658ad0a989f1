// tests/unit/RateGovernor.test.ts

import { describe, it, expect } from 'vitest';
import { RateGovernor, Throttle, DEFAULT_RATE_LIMITS } from '../../src/core/http/RateGovernor';
import { descriptor } from '../helpers/fakes';

describe('RateGovernor', () => {
  const governor = new RateGovernor(DEFAULT_RATE_LIMITS);

  it('should use the configured rate when one is given', () => {
    expect(governor.delayFor('/agents', 4)).toBe(250);
  });

  it('should fall back to the rate table by path substring', () => {
    expect(governor.delayFor('/agents')).toBe(500);
  });

  it('should prefer the most specific table entry', () => {
    // Both '/alerts' and '/cloud-detection/alerts' match
    expect(governor.delayFor('/cloud-detection/alerts')).toBe(2000);
    expect(governor.delayFor('/alerts')).toBe(500);
  });

  it('should use the default rate for unknown paths', () => {
    expect(governor.delayFor('/sites')).toBe(1000);
  });

  it('should ignore a non-positive configured rate', () => {
    expect(governor.delayFor('/sites', 0)).toBe(1000);
  });

  it('should hand out independent throttles per retrieval', () => {
    const sites = descriptor({ name: 'sites' });
    const first = governor.throttleFor(sites);

    first.escalate();
    first.escalate();

    expect(first.delay).toBe(4000);
    expect(governor.throttleFor(sites).delay).toBe(1000);
  });

  it('should apply descriptor rate overrides to the throttle', () => {
    const throttle = governor.throttleFor(descriptor({ name: 'api-tokens', rateLimit: 0.5 }));

    expect(throttle.delay).toBe(2000);
  });
});

describe('Throttle', () => {
  it('should double on every escalation', () => {
    const throttle = new Throttle(300);

    expect(throttle.escalate()).toBe(600);
    expect(throttle.escalate()).toBe(1200);
    expect(throttle.initialDelay).toBe(300);
  });
});
