import type { AddressConsistencyFlag, AddressFieldSet, AddressParts, CompanyRecord, PostalTolerance } from '../types.js';

export interface AddressOptions {
  /**
   * When state and country agree but a postal code is missing:
   * - `either`: still a match if at least one side lacks it
   * - `one-side`: a match only if exactly one side lacks it
   * - `none`: never a match without two equal postal codes
   */
  postalTolerance: PostalTolerance;
}

export const DEFAULT_ADDRESS_OPTIONS: AddressOptions = { postalTolerance: 'either' };

export const NO_ADDRESS_DATA = 'no comparable address data';

export const ADDRESS_LABELS: Record<AddressFieldSet, string> = {
  'customer.billing': 'Customer Billing Address',
  'customer.enrichment': 'Customer Enrichment Address',
  'parent.billing': 'Parent Billing Address',
  'parent.enrichment': 'Parent Enrichment Address',
};

/** Tried in order; the first pair with data on both sides is compared. */
export const ADDRESS_PRECEDENCE: ReadonlyArray<[AddressFieldSet, AddressFieldSet]> = [
  ['customer.billing', 'parent.enrichment'],
  ['customer.billing', 'parent.billing'],
  ['customer.enrichment', 'parent.enrichment'],
  ['customer.enrichment', 'parent.billing'],
];

export interface AddressPair {
  fields: [AddressFieldSet, AddressFieldSet];
  left: AddressParts;
  right: AddressParts;
}

function addressOf(set: AddressFieldSet, child: CompanyRecord, parent: CompanyRecord): AddressParts {
  switch (set) {
    case 'customer.billing': return child.billing;
    case 'customer.enrichment': return child.enrichment.address;
    case 'parent.billing': return parent.billing;
    case 'parent.enrichment': return parent.enrichment.address;
  }
}

const text = (v: string | undefined) => (v ?? '').trim();

export function hasAddressData(a: AddressParts): boolean {
  return Boolean(text(a.state) || text(a.country) || text(a.postalCode));
}

export function selectAddressPair(child: CompanyRecord, parent: CompanyRecord): AddressPair | null {
  for (const [l, r] of ADDRESS_PRECEDENCE) {
    const left = addressOf(l, child, parent);
    const right = addressOf(r, child, parent);
    if (hasAddressData(left) && hasAddressData(right)) return { fields: [l, r], left, right };
  }
  return null;
}

/**
 * State and country must be present and equal on both sides
 * (case-insensitive); postal codes must then be equal, unless the
 * configured tolerance accepts a missing one.
 */
export function compareAddresses(
  a: AddressParts,
  b: AddressParts,
  options: AddressOptions = DEFAULT_ADDRESS_OPTIONS,
): { match: boolean; reason: string } {
  for (const key of ['state', 'country'] as const) {
    const va = text(a[key]);
    const vb = text(b[key]);
    if (!va || !vb) return { match: false, reason: `${key} is missing on ${!va && !vb ? 'both sides' : 'one side'}` };
    if (va.toLowerCase() !== vb.toLowerCase()) return { match: false, reason: `${key} differs ('${va}' vs '${vb}')` };
  }

  const where = `${text(a.state)}, ${text(a.country)}`;
  const pa = text(a.postalCode).replace(/\s+/g, '');
  const pb = text(b.postalCode).replace(/\s+/g, '');
  if (pa && pb) {
    if (pa.toLowerCase() === pb.toLowerCase()) {
      return { match: true, reason: `state, country and postal code match (${where}, ${pa})` };
    }
    return { match: false, reason: `state and country match (${where}) but postal code differs ('${pa}' vs '${pb}')` };
  }

  const missing = !pa && !pb ? 'both sides' : 'one side';
  const tolerated =
    options.postalTolerance === 'either' || (options.postalTolerance === 'one-side' && missing === 'one side');
  if (tolerated) return { match: true, reason: `state and country match (${where}); postal code missing on ${missing}` };
  return { match: false, reason: `state and country match (${where}) but postal code is missing on ${missing}` };
}

export function addressConsistency(
  child: CompanyRecord,
  parent: CompanyRecord,
  options: AddressOptions = DEFAULT_ADDRESS_OPTIONS,
): AddressConsistencyFlag {
  const pair = selectAddressPair(child, parent);
  if (!pair) return { isConsistent: false, explanation: NO_ADDRESS_DATA, fieldsCompared: null };
  const { match, reason } = compareAddresses(pair.left, pair.right, options);
  const [l, r] = pair.fields;
  return {
    isConsistent: match,
    explanation: `${ADDRESS_LABELS[l]} vs ${ADDRESS_LABELS[r]}: ${reason}`,
    fieldsCompared: pair.fields,
  };
}
