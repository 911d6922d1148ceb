export interface AddressParts {
  state?: string;
  country?: string;
  postalCode?: string;
}

export interface Enrichment {
  companyName?: string;
  website?: string;
  address: AddressParts;
}

/**
 * One business entity, customer or shell. Blank strings are normalized to
 * undefined by the record schema before they reach the engine.
 */
export interface CompanyRecord {
  id: string;
  name?: string;
  website?: string;
  /** Most frequent contact email seen on the record. */
  email?: string;
  billing: AddressParts;
  enrichment: Enrichment;
  parentId?: string;
  /** Denormalized display copy of the parent's name. */
  parentName?: string;
}

/** Marker for a linked parent that the record source could not return. */
export interface UnresolvedParent {
  unresolved: string;
}

/** What a record source yields for a parent id: the record, a marker, or nothing. */
export type ParentLookup = CompanyRecord | UnresolvedParent | undefined;

export type BadDomainField = 'email' | 'website' | 'enrichmentWebsite';

export interface BadDomainMatch {
  field: BadDomainField;
  domain: string;
  root: string;
}

export type BadDomainFlag =
  | { isBad: true; explanation: string; matches: [BadDomainMatch, ...BadDomainMatch[]] }
  | { isBad: false; explanation: string; matches: [] };

export interface ScoreFlag {
  score: number;
  explanation: string;
}

export interface CustomerConsistencyFlag extends ScoreFlag {
  /** Field pair that produced the maximum, null when nothing was comparable. */
  fields: [string, string] | null;
}

export interface CustomerShellCoherenceFlag extends ScoreFlag {
  nameScore: number | null;
  websiteScore: number | null;
  fields: Array<[string, string]>;
}

export type AddressFieldSet = 'customer.billing' | 'customer.enrichment' | 'parent.billing' | 'parent.enrichment';

export interface AddressConsistencyFlag {
  isConsistent: boolean;
  explanation: string;
  fieldsCompared: [AddressFieldSet, AddressFieldSet] | null;
}

export type PostalTolerance = 'either' | 'one-side' | 'none';

export interface TerminatedFlags {
  stage: 'terminated';
  badDomain: Extract<BadDomainFlag, { isBad: true }>;
}

export interface NoShellFlags {
  stage: 'complete';
  badDomain: Extract<BadDomainFlag, { isBad: false }>;
  hasShell: false;
  customerConsistency: CustomerConsistencyFlag;
}

export interface ShellFlags {
  stage: 'complete';
  badDomain: Extract<BadDomainFlag, { isBad: false }>;
  hasShell: true;
  customerConsistency: CustomerConsistencyFlag;
  customerShellCoherence: CustomerShellCoherenceFlag;
  addressConsistency: AddressConsistencyFlag;
}

export type RelationshipFlags = TerminatedFlags | NoShellFlags | ShellFlags;

export interface EvaluationInput {
  record: CompanyRecord;
  parent?: CompanyRecord | UnresolvedParent;
}

export interface EvaluationResult extends EvaluationInput {
  flags: RelationshipFlags;
}
