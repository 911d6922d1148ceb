import fs from 'node:fs';
import { readCsv } from '../utils/csv.js';
import { ConfigurationError } from '../errors.js';
import { normalizeDomain } from './normalize.js';
import { isKnownSuffix } from './suffixes.js';
import type { DomainSource } from './normalize.js';
import type { BadDomainField, BadDomainFlag, BadDomainMatch, CompanyRecord } from '../types.js';

export interface DisallowList {
  readonly domains: ReadonlySet<string>;
  /** Where the list came from, for logs and `/health`. */
  readonly source: string;
}

const LIST_COLUMN = 'bad_domains';
const MALFORMED_TAIL = /^[a-z0-9]{1,4}$/;

const FIELD_LABEL: Record<BadDomainField, string> = {
  email: 'Email',
  website: 'Website',
  enrichmentWebsite: 'Enrichment website',
};

export const CLEAN_EXPLANATION = 'no bad domain detected';

function cleanEntry(raw: string) {
  return raw.replace(/[\t"]/g, '').trim().toLowerCase().replace(/^(?:www\.)+/, '').replace(/\.+$/, '');
}

/** Build an immutable disallow-list from raw domain strings. */
export function createDisallowList(domains: Iterable<string>, source = 'inline'): DisallowList {
  const set = new Set<string>();
  for (const d of domains) {
    const c = cleanEntry(d);
    if (c) set.add(c);
  }
  return Object.freeze({ domains: set, source });
}

/**
 * Load the disallow-list CSV (single `bad_domains` column). Called once by
 * the startup sequence; the result is shared read-only by every evaluation.
 *
 * @throws ConfigurationError when the file is missing, has no `bad_domains`
 * column, or yields no domains.
 */
export async function loadDisallowList(filePath: string): Promise<DisallowList> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Disallow-list not found at ${filePath}`);
  }
  let rows: Record<string, string>[];
  try {
    rows = await readCsv(filePath);
  } catch (e) {
    throw new ConfigurationError(`Disallow-list at ${filePath} could not be parsed`, { cause: e });
  }
  if (rows.length && !(LIST_COLUMN in rows[0])) {
    throw new ConfigurationError(`Disallow-list at ${filePath} has no '${LIST_COLUMN}' column`);
  }
  const list = createDisallowList(rows.map((r) => r[LIST_COLUMN] || ''), filePath);
  if (list.domains.size === 0) {
    throw new ConfigurationError(`Disallow-list at ${filePath} is empty`);
  }
  return list;
}

/**
 * Gate of the flag pipeline: flags consumer webmail, disposable and
 * placeholder domains found on a record's email or website.
 */
export class BadDomainClassifier {
  constructor(private readonly list: DisallowList) {}

  get size() {
    return this.list.domains.size;
  }

  get source() {
    return this.list.source;
  }

  /**
   * Listed root domain the given normalized domain falls under, or null.
   * Tries an exact hit, then the domain with leading labels stripped
   * (`test.ringcentral.com` → `ringcentral.com`), then a listed domain with
   * a short junk tail glued on (`yahoo.co.ukx`).
   */
  matchDomain(domain: string): string | null {
    const set = this.list.domains;
    if (set.has(domain)) return domain;

    const labels = domain.split('.');
    for (let i = 1; i < labels.length - 1; i++) {
      const parent = labels.slice(i).join('.');
      if (set.has(parent)) return parent;
    }

    if (isKnownSuffix(labels[labels.length - 1])) return null;
    for (const bad of set) {
      if (domain.length > bad.length && domain.startsWith(bad) && MALFORMED_TAIL.test(domain.slice(bad.length))) {
        return bad;
      }
    }
    return null;
  }

  classify(record: Pick<CompanyRecord, 'email' | 'website' | 'enrichment'>): BadDomainFlag {
    const candidates: Array<{ field: BadDomainField; value: string; source: DomainSource }> = [];
    if (record.email) candidates.push({ field: 'email', value: record.email, source: 'email' });
    if (record.website) candidates.push({ field: 'website', value: record.website, source: 'url' });
    else if (record.enrichment?.website) {
      candidates.push({ field: 'enrichmentWebsite', value: record.enrichment.website, source: 'url' });
    }

    const matches: BadDomainMatch[] = [];
    for (const c of candidates) {
      const normalized = normalizeDomain(c.value, c.source);
      // Unparseable values cannot be judged; the coherence flags report them instead.
      if (!normalized.ok) continue;
      const root = this.matchDomain(normalized.domain);
      if (root) matches.push({ field: c.field, domain: normalized.domain, root });
    }

    if (matches.length === 0) return { isBad: false, explanation: CLEAN_EXPLANATION, matches: [] };
    const [first, ...rest] = matches;
    return { isBad: true, explanation: explainMatches(matches), matches: [first, ...rest] };
  }
}

function explainMatches(matches: BadDomainMatch[]) {
  return matches
    .map((m) => `${FIELD_LABEL[m.field]} domain '${m.domain}' matches disallowed domain '${m.root}'`)
    .join(' and ');
}
