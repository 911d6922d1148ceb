import { sameRecordId } from '../records/ids.js';
import type { AddressParts, CompanyRecord, ParentLookup, RelationshipFlags } from '../types.js';

/**
 * Trust tiers the downstream reasoning step weighs signals by: the record's
 * own fields are trusted, enrichment copies are semi-reliable, flags are
 * computed.
 */
export type TrustTier = 'trusted' | 'semi-reliable' | 'computed';

export interface Annotated<T> {
  value: T | null;
  trust: Exclude<TrustTier, 'computed'>;
}

export interface CustomerFields {
  id: Annotated<string>;
  name: Annotated<string>;
  parent_id: Annotated<string>;
  parent_name: Annotated<string>;
  website: Annotated<string>;
  email: Annotated<string>;
  billing_address: Annotated<string>;
  enrichment_company_name: Annotated<string>;
  enrichment_website: Annotated<string>;
  enrichment_billing_address: Annotated<string>;
}

export type ParentFields = Omit<CustomerFields, 'parent_id' | 'parent_name' | 'email'>;

export interface WireFlags {
  trust: 'computed';
  bad_domain: { is_bad: boolean; explanation: string };
  has_shell?: boolean;
  customer_consistency?: { score: number; explanation: string };
  customer_shell_coherence?: { score: number; explanation: string };
  address_consistency?: { is_consistent: boolean; explanation: string; fields_compared: [string, string] | null };
}

export interface ReasoningPayload {
  customer: CustomerFields;
  parent?: ParentFields;
  /** Set when a parent is linked but its record could not be fetched. */
  unresolved_parent_id?: string;
  flags: WireFlags;
}

const trusted = (value: string | undefined): Annotated<string> => ({ value: value ?? null, trust: 'trusted' });
const semi = (value: string | undefined): Annotated<string> => ({ value: value ?? null, trust: 'semi-reliable' });

/** `"CA, US, 94105"`, skipping missing parts. */
export function formatAddress(a: AddressParts): string | undefined {
  const parts = [a.state, a.country, a.postalCode].map((p) => (p ?? '').trim()).filter(Boolean);
  return parts.length ? parts.join(', ') : undefined;
}

function sharedFields(r: CompanyRecord): ParentFields {
  return {
    id: trusted(r.id),
    name: trusted(r.name),
    website: trusted(r.website),
    billing_address: trusted(formatAddress(r.billing)),
    enrichment_company_name: semi(r.enrichment.companyName),
    enrichment_website: semi(r.enrichment.website),
    enrichment_billing_address: semi(formatAddress(r.enrichment.address)),
  };
}

export function serializeFlags(flags: RelationshipFlags): WireFlags {
  const out: WireFlags = {
    trust: 'computed',
    bad_domain: { is_bad: flags.badDomain.isBad, explanation: flags.badDomain.explanation },
  };
  if (flags.stage === 'terminated') return out;
  out.has_shell = flags.hasShell;
  out.customer_consistency = { score: flags.customerConsistency.score, explanation: flags.customerConsistency.explanation };
  if (flags.hasShell) {
    out.customer_shell_coherence = {
      score: flags.customerShellCoherence.score,
      explanation: flags.customerShellCoherence.explanation,
    };
    out.address_consistency = {
      is_consistent: flags.addressConsistency.isConsistent,
      explanation: flags.addressConsistency.explanation,
      fields_compared: flags.addressConsistency.fieldsCompared,
    };
  }
  return out;
}

/**
 * Input object for the external confidence scorer: raw customer fields,
 * the resolved parent's fields (only when the record has a shell and the
 * supplied parent is the linked one), and the flag bundle, each tagged with
 * its trust tier.
 */
export function buildReasoningPayload(
  record: CompanyRecord,
  parent: ParentLookup,
  flags: RelationshipFlags,
): ReasoningPayload {
  const payload: ReasoningPayload = {
    customer: {
      ...sharedFields(record),
      parent_id: trusted(record.parentId),
      parent_name: trusted(record.parentName),
      email: trusted(record.email),
    },
    flags: serializeFlags(flags),
  };
  if (flags.stage === 'complete' && flags.hasShell && parent) {
    if ('unresolved' in parent) payload.unresolved_parent_id = parent.unresolved;
    else if (sameRecordId(parent.id, record.parentId)) payload.parent = sharedFields(parent);
  }
  return payload;
}
