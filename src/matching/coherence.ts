import { clampScore, domainSimilarity, nameDomainSimilarity, similarity } from './similarity.js';
import type { Similarity } from './similarity.js';
import type { CompanyRecord, CustomerConsistencyFlag, CustomerShellCoherenceFlag } from '../types.js';

export const NO_WEBSITE_DATA = 'no website data available';
export const NO_SHELL_DATA = 'insufficient data for shell coherence comparison';

type Field = (r: CompanyRecord) => string | undefined;

/**
 * One comparison in a precedence list. Pairs are evaluated in order and
 * skipped when either side is empty, so the lists below read as the
 * field-precedence rules themselves.
 */
export interface PairCandidate {
  fields: [string, string];
  left: Field;
  right: Field;
  compare: (a: string, b: string) => Similarity;
}

export interface ScoredPair {
  fields: [string, string];
  score: number;
  detail: string;
  /** False when a side could not be read (`N/A` as a website). */
  usable: boolean;
}

const name: Field = (r) => r.name;
const website: Field = (r) => r.website;
const zName: Field = (r) => r.enrichment.companyName;
const zWebsite: Field = (r) => r.enrichment.website;

export const CUSTOMER_CONSISTENCY_PAIRS: PairCandidate[] = [
  { fields: ['Name', 'Website'], left: name, right: website, compare: nameDomainSimilarity },
  { fields: ['Name', 'Enrichment Website'], left: name, right: zWebsite, compare: nameDomainSimilarity },
  { fields: ['Enrichment Company Name', 'Website'], left: zName, right: website, compare: nameDomainSimilarity },
  { fields: ['Enrichment Company Name', 'Enrichment Website'], left: zName, right: zWebsite, compare: nameDomainSimilarity },
  { fields: ['Name', 'Enrichment Company Name'], left: name, right: zName, compare: similarity },
];

export const SHELL_NAME_PAIRS: PairCandidate[] = [
  { fields: ['Customer Name', 'Parent Name'], left: name, right: name, compare: similarity },
  { fields: ['Customer Name', 'Parent Enrichment Company Name'], left: name, right: zName, compare: similarity },
  { fields: ['Customer Enrichment Company Name', 'Parent Name'], left: zName, right: name, compare: similarity },
  { fields: ['Customer Enrichment Company Name', 'Parent Enrichment Company Name'], left: zName, right: zName, compare: similarity },
];

export const SHELL_WEBSITE_PAIRS: PairCandidate[] = [
  { fields: ['Customer Website', 'Parent Website'], left: website, right: website, compare: domainSimilarity },
  { fields: ['Customer Website', 'Parent Enrichment Website'], left: website, right: zWebsite, compare: domainSimilarity },
  { fields: ['Customer Enrichment Website', 'Parent Website'], left: zWebsite, right: website, compare: domainSimilarity },
  { fields: ['Customer Enrichment Website', 'Parent Enrichment Website'], left: zWebsite, right: zWebsite, compare: domainSimilarity },
];

export function scorePairs(candidates: PairCandidate[], left: CompanyRecord, right: CompanyRecord): ScoredPair[] {
  const out: ScoredPair[] = [];
  for (const c of candidates) {
    const a = c.left(left);
    const b = c.right(right);
    if (!a || !b) continue;
    const s = c.compare(a, b);
    out.push({ fields: c.fields, score: clampScore(s.score), detail: s.explanation, usable: !s.insufficient });
  }
  return out;
}

/** Highest-scoring usable pair; the earlier pair wins a tie. */
export function bestPair(pairs: ScoredPair[]): ScoredPair | undefined {
  let best: ScoredPair | undefined;
  for (const p of pairs) {
    if (!p.usable) continue;
    if (!best || p.score > best.score) best = p;
  }
  return best;
}

function describe(p: ScoredPair) {
  return `${p.fields[0]} vs ${p.fields[1]} scored ${p.score} (${p.detail})`;
}

function skipped(pairs: ScoredPair[]) {
  const first = pairs.find((p) => !p.usable);
  return first ? ` (${first.fields[0]} vs ${first.fields[1]}: ${first.detail})` : '';
}

/**
 * Internal coherence of a record: does its name fit its own website, or
 * the enrichment copies of either? Best pair wins.
 */
export function customerConsistency(record: CompanyRecord): CustomerConsistencyFlag {
  if (!record.website && !record.enrichment.website) {
    return { score: 0, explanation: NO_WEBSITE_DATA, fields: null };
  }
  const pairs = scorePairs(CUSTOMER_CONSISTENCY_PAIRS, record, record);
  // With no usable pair, the first unreadable one explains the 0.
  const top = bestPair(pairs) ?? pairs[0];
  if (!top) {
    return { score: 0, explanation: 'insufficient data: no name to compare with the website data', fields: null };
  }
  return { score: top.score, explanation: describe(top), fields: top.fields };
}

/**
 * Metadata coherence between a customer and its parent: the best name
 * pairing and the best website pairing, averaged with equal weight. When
 * only one of the two groups has comparable data its score stands alone.
 */
export function customerShellCoherence(child: CompanyRecord, parent: CompanyRecord): CustomerShellCoherenceFlag {
  const namePairs = scorePairs(SHELL_NAME_PAIRS, child, parent);
  const sitePairs = scorePairs(SHELL_WEBSITE_PAIRS, child, parent);
  const names = bestPair(namePairs);
  const sites = bestPair(sitePairs);

  if (!names && !sites) {
    return { score: 0, explanation: NO_SHELL_DATA, nameScore: null, websiteScore: null, fields: [] };
  }

  const parts: string[] = [];
  const fields: Array<[string, string]> = [];
  if (names) {
    parts.push(`Names: ${describe(names)}`);
    fields.push(names.fields);
  } else {
    parts.push(`Names: no comparable names${skipped(namePairs)}`);
  }
  if (sites) {
    parts.push(`Websites: ${describe(sites)}`);
    fields.push(sites.fields);
  } else {
    parts.push(`Websites: no comparable websites${skipped(sitePairs)}`);
  }

  let score: number;
  if (names && sites) {
    score = clampScore((names.score + sites.score) / 2);
    parts.push(`combined score ${score} (equal-weighted average)`);
  } else {
    score = names ? names.score : sites ? sites.score : 0;
    parts.push(`score ${score} from ${names ? 'names' : 'websites'} only`);
  }

  return {
    score,
    explanation: parts.join('; '),
    nameScore: names ? names.score : null,
    websiteScore: sites ? sites.score : null,
    fields,
  };
}
