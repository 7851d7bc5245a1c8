import { describe, expect, it } from 'vitest';

import { ValidationError, loadMarketConfig } from '../src';

const payment = { budget: 1.5, driver: 'erc20', network: 'holesky' };

describe('loadMarketConfig', () => {
  it('loads market and payment settings', () => {
    const config = loadMarketConfig({
      market: { subnet_tag: 'public', api_url: 'http://127.0.0.1:7465', app_key: 'test-secret' },
      payment,
    });

    expect(config.market.subnet_tag).toBe('public');
    expect(config.market.app_key).toBe('test-secret');
    expect(config.payment).toEqual(payment);
  });

  it('reports missing sections', () => {
    try {
      loadMarketConfig({ market: { subnet_tag: 'public' } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.missingKeys).toEqual(['payment']);
      expect(err.message).toBe('Invalid market config: Missing key: `payment`');
    }
  });

  it('reports unexpected keys', () => {
    try {
      loadMarketConfig({ market: { subnet_tag: 'public', extra: true }, payment });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.unexpectedKeys).toEqual(['market.extra']);
      expect(err.issues).toEqual(['Unexpected keys: `extra` at `market`']);
    }
  });

  it('rejects a non-positive budget', () => {
    expect(() => loadMarketConfig({ market: { subnet_tag: 'public' }, payment: { ...payment, budget: 0 } })).toThrow(
      '`payment.budget`: Number must be greater than 0',
    );
  });
});
