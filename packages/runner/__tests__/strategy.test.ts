import { describe, expect, it, vi } from 'vitest';

import { BLACKLISTED_SCORE, BlacklistOnFailure, LoggerService } from '../src';

describe('BlacklistOnFailure', () => {
  const base = { scoreOffer: vi.fn(async () => 0.75) };

  it('passes offers through to the base scorer', async () => {
    const strategy = new BlacklistOnFailure(base, LoggerService.silent());

    expect(await strategy.scoreOffer({ id: 'offer-1', issuer: 'provider-a' })).toBe(0.75);
    expect(base.scoreOffer).toHaveBeenCalledWith({ id: 'offer-1', issuer: 'provider-a' });
  });

  it('rejects offers from a blacklisted issuer without asking the base scorer', async () => {
    base.scoreOffer.mockClear();
    const strategy = new BlacklistOnFailure(base, LoggerService.silent());
    strategy.blacklist('provider-a');

    expect(strategy.isBlacklisted('provider-a')).toBe(true);
    expect(strategy.isBlacklisted('provider-b')).toBe(false);
    expect(await strategy.scoreOffer({ id: 'offer-2', issuer: 'provider-a' })).toBe(BLACKLISTED_SCORE);
    expect(base.scoreOffer).not.toHaveBeenCalled();
  });
});
