import { describe, it, expect } from 'vitest';
import { addressConsistency, compareAddresses, NO_ADDRESS_DATA } from '../src/matching/address.js';
import { acmeChild, acmeParent, rec } from './fixtures.js';

const SF = { state: 'CA', country: 'US', postalCode: '94105' };
const NO_POSTAL = { state: 'CA', country: 'US' };

describe('addressConsistency', () => {
  it('compares customer billing with parent enrichment first', () => {
    expect(addressConsistency(acmeChild, acmeParent)).toEqual({
      isConsistent: true,
      explanation: 'Customer Billing Address vs Parent Enrichment Address: state, country and postal code match (CA, US, 94105)',
      fieldsCompared: ['customer.billing', 'parent.enrichment'],
    });
  });

  it('walks the precedence list', () => {
    const childBilling = rec({ billing: SF });
    const childEnrichment = rec({ enrichment: { address: SF } });
    const parentBilling = rec({ id: 'P-1', billing: SF });
    const parentEnrichment = rec({ id: 'P-1', enrichment: { address: SF } });

    expect(addressConsistency(childBilling, parentBilling).fieldsCompared).toEqual(['customer.billing', 'parent.billing']);
    expect(addressConsistency(childEnrichment, parentEnrichment).fieldsCompared).toEqual([
      'customer.enrichment',
      'parent.enrichment',
    ]);
    expect(addressConsistency(childEnrichment, parentBilling).fieldsCompared).toEqual([
      'customer.enrichment',
      'parent.billing',
    ]);
  });

  it('reports when no pair has data on both sides', () => {
    expect(addressConsistency(rec({ billing: SF }), rec({ id: 'P-1' }))).toEqual({
      isConsistent: false,
      explanation: NO_ADDRESS_DATA,
      fieldsCompared: null,
    });
  });

  it('names the differing component', () => {
    const flag = addressConsistency(rec({ billing: SF }), rec({ id: 'P-1', billing: { ...SF, state: 'NY' } }));
    expect(flag.isConsistent).toBe(false);
    expect(flag.explanation).toBe("Customer Billing Address vs Parent Billing Address: state differs ('CA' vs 'NY')");
  });
});

describe('compareAddresses', () => {
  it('ignores case and postal-code spacing', () => {
    expect(compareAddresses({ state: 'ca', country: 'us', postalCode: '94105' }, SF)).toEqual({
      match: true,
      reason: 'state, country and postal code match (ca, us, 94105)',
    });
    expect(
      compareAddresses(
        { state: 'London', country: 'GB', postalCode: 'SW1A 1AA' },
        { state: 'london', country: 'gb', postalCode: 'sw1a1aa' },
      ).reason,
    ).toBe('state, country and postal code match (London, GB, SW1A1AA)');
  });

  it('rejects different postal codes', () => {
    expect(compareAddresses(SF, { ...SF, postalCode: '10001' })).toEqual({
      match: false,
      reason: "state and country match (CA, US) but postal code differs ('94105' vs '10001')",
    });
  });

  it('requires state and country on both sides', () => {
    expect(compareAddresses({ country: 'US' }, SF).reason).toBe('state is missing on one side');
    expect(compareAddresses({ state: 'CA' }, { state: 'CA' }).reason).toBe('country is missing on both sides');
  });

  it('tolerates missing postal codes per mode', () => {
    expect(compareAddresses(SF, NO_POSTAL, { postalTolerance: 'either' })).toEqual({
      match: true,
      reason: 'state and country match (CA, US); postal code missing on one side',
    });
    expect(compareAddresses(SF, NO_POSTAL, { postalTolerance: 'one-side' }).match).toBe(true);
    expect(compareAddresses(SF, NO_POSTAL, { postalTolerance: 'none' })).toEqual({
      match: false,
      reason: 'state and country match (CA, US) but postal code is missing on one side',
    });

    expect(compareAddresses(NO_POSTAL, NO_POSTAL, { postalTolerance: 'either' }).match).toBe(true);
    expect(compareAddresses(NO_POSTAL, NO_POSTAL, { postalTolerance: 'one-side' })).toEqual({
      match: false,
      reason: 'state and country match (CA, US) but postal code is missing on both sides',
    });
    expect(compareAddresses(NO_POSTAL, NO_POSTAL, { postalTolerance: 'none' }).match).toBe(false);
  });
});
