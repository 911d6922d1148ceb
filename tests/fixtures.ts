import { BadDomainClassifier, createDisallowList } from '../src/domain/badDomains.js';
import type { CompanyRecord, RelationshipFlags, ShellFlags } from '../src/types.js';

export const TEST_DISALLOWED = ['gmail.com', 'ringcentral.com', 'yahoo.co.uk', 'example.com'];

export function testClassifier() {
  return new BadDomainClassifier(createDisallowList(TEST_DISALLOWED, 'test'));
}

export function rec(over: Partial<CompanyRecord> = {}): CompanyRecord {
  return { id: 'C-1', billing: {}, enrichment: { address: {} }, ...over };
}

export const acmeParent = rec({
  id: 'P-100',
  name: 'Acme Corporation',
  website: 'acme.com',
  enrichment: { address: { state: 'CA', country: 'US', postalCode: '94105' } },
});

export const acmeChild = rec({
  id: 'C-101',
  name: 'Acme West LLC',
  website: 'west.acme.com',
  billing: { state: 'CA', country: 'US', postalCode: '94105' },
  parentId: 'P-100',
  parentName: 'Acme Corporation',
});

export function shellFlags(flags: RelationshipFlags): ShellFlags {
  if (flags.stage !== 'complete' || !flags.hasShell) {
    throw new Error(`expected flags with a shell, got ${JSON.stringify(flags)}`);
  }
  return flags;
}
