import { describe, expect, it } from 'vitest';
import { FakeFareApi, makeFare } from '../test/fare-api.js';
import { MIN_LAYOVER_HOURS, PairingFilter } from './pairing.js';
import { PREFERRED_RETURN_GAP_HOURS, ReturnMatcher } from './return-matcher.js';

const outbound = makeFare({
  to: 'BCN',
  departure: '2025-08-20T06:00:00',
  arrival: '2025-08-20T09:00:00',
  price: 25.5,
  currency: 'GBP'
});

function pairingWithReturnAt(departure: string, options: { minLayoverHours?: number; price?: number; currency?: string } = {}) {
  const api = new FakeFareApi(() => [
    makeFare({
      from: 'BCN',
      to: 'STN',
      departure,
      arrival: '2025-08-20T23:30:00',
      price: options.price ?? 40.25,
      currency: options.currency ?? 'EUR'
    })
  ]);
  const pairing = new PairingFilter(new ReturnMatcher(api), {
    returnCurrency: 'EUR',
    minLayoverHours: options.minLayoverHours
  });
  return { api, pairing };
}

describe('PairingFilter', () => {
  it('asks for the return in the fixed return currency', async () => {
    const { api, pairing } = pairingWithReturnAt('2025-08-20T15:00:00');

    await pairing.pairFlights(outbound);

    expect(api.queries[0].currency).toBe('EUR');
  });

  it('accepts a layover of exactly four hours', async () => {
    const { pairing } = pairingWithReturnAt('2025-08-20T13:00:00');

    const pair = await pairing.pairFlights(outbound);

    expect(MIN_LAYOVER_HOURS).toBe(4);
    expect(pair?.layoverHours).toBe(4);
  });

  it('rejects a layover just under four hours', async () => {
    const { pairing } = pairingWithReturnAt('2025-08-20T12:59:59');
    await expect(pairing.pairFlights(outbound)).resolves.toBeUndefined();
  });

  it('sums prices without conversion and reports the return currency', async () => {
    const { pairing } = pairingWithReturnAt('2025-08-20T17:00:00');

    const pair = await pairing.pairFlights(outbound);

    expect(pair).toMatchObject({
      totalPrice: 65.75,
      layoverHours: 8,
      currency: 'EUR',
      currencyMismatch: true
    });
  });

  it('does not flag matching currencies', async () => {
    const { pairing } = pairingWithReturnAt('2025-08-20T17:00:00', { currency: 'GBP' });

    const pair = await pairing.pairFlights(outbound);

    expect(pair?.currencyMismatch).toBe(false);
    expect(pair?.currency).toBe('GBP');
  });

  it('can enforce the preferred six-hour gap instead', async () => {
    const { pairing } = pairingWithReturnAt('2025-08-20T14:00:00', { minLayoverHours: PREFERRED_RETURN_GAP_HOURS });
    await expect(pairing.pairFlights(outbound)).resolves.toBeUndefined();

    const { pairing: relaxed } = pairingWithReturnAt('2025-08-20T15:00:00', { minLayoverHours: PREFERRED_RETURN_GAP_HOURS });
    await expect(relaxed.pairFlights(outbound)).resolves.toMatchObject({ layoverHours: 6 });
  });

  it('returns undefined when no return exists', async () => {
    const api = new FakeFareApi(() => []);
    const pairing = new PairingFilter(new ReturnMatcher(api), { returnCurrency: 'EUR' });

    await expect(pairing.pairFlights(outbound)).resolves.toBeUndefined();
  });
});
