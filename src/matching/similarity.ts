import { distance } from 'fastest-levenshtein';
import { domainLabel, hostLabels, normalizeDomain, registrableDomain } from '../domain/normalize.js';

export interface Similarity {
  score: number;
  explanation: string;
  /** Set when one side could not be read; the score is then not a measurement. */
  insufficient?: true;
}

export type SimilarityMethod = 'full-string' | 'token-sort' | 'token-set';

export const INSUFFICIENT_DATA = 'insufficient data';

// Legal-entity forms dropped before comparing company names.
const LEGAL_FORMS = new Set([
  'inc', 'incorporated', 'corp', 'corporation', 'co', 'company', 'companies',
  'ltd', 'limited', 'llc', 'llp', 'lp', 'lllp', 'pllc', 'pc', 'plc',
  'gmbh', 'ag', 'sa', 'sarl', 'srl', 'spa', 'bv', 'nv', 'pty', 'pte', 'kk', 'oy', 'ab', 'as',
  'group', 'holdings', 'enterprises',
]);

export function clampScore(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(100, Math.max(0, Math.round(n)));
}

/**
 * Lowercase, fold accents, drop punctuation and legal-entity suffixes,
 * collapse whitespace. A name made only of legal forms ("Company Inc")
 * keeps its tokens rather than vanishing.
 */
export function normalizeName(s: string | null | undefined): string {
  if (typeof s !== 'string') return '';
  const tokens = s
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/['’.]/g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .split(' ')
    .filter(Boolean);
  const kept = tokens.filter((t) => !LEGAL_FORMS.has(t));
  return (kept.length ? kept : tokens).join(' ');
}

/** Levenshtein ratio on a 0–100 scale. */
export function ratio(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (!maxLen) return 100;
  return clampScore(100 * (1 - distance(a, b) / maxLen));
}

function tokenSortRatio(a: string[], b: string[]) {
  return ratio([...a].sort().join(' '), [...b].sort().join(' '));
}

// Compares the shared tokens against each side's full token set, so a name
// that is a subset of the other ("acme" / "acme west") scores 100.
function tokenSetRatio(a: string[], b: string[]) {
  const A = new Set(a);
  const B = new Set(b);
  const inter = [...A].filter((t) => B.has(t)).sort();
  const onlyA = [...A].filter((t) => !B.has(t)).sort();
  const onlyB = [...B].filter((t) => !A.has(t)).sort();
  const t0 = inter.join(' ');
  const t1 = [...inter, ...onlyA].join(' ');
  const t2 = [...inter, ...onlyB].join(' ');
  const scores = [ratio(t1, t2)];
  if (t0) scores.push(ratio(t0, t1), ratio(t0, t2));
  return Math.max(...scores);
}

/**
 * Fuzzy similarity of two free-text names, 0–100.
 *
 * Takes the best of a plain ratio on the normalized strings, a ratio on
 * their sorted tokens and a token-set ratio, so word order and extra words
 * on one side do not sink the score. Symmetric; identical non-empty names
 * score 100.
 */
export function similarity(a: string | null | undefined, b: string | null | undefined): Similarity {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  if (!na || !nb) return { score: 0, explanation: INSUFFICIENT_DATA, insufficient: true };

  const ta = na.split(' ');
  const tb = nb.split(' ');
  const candidates: Array<[SimilarityMethod, number]> = [
    ['full-string', ratio(na, nb)],
    ['token-sort', tokenSortRatio(ta, tb)],
    ['token-set', tokenSetRatio(ta, tb)],
  ];
  let [method, score] = candidates[0];
  for (const [m, s] of candidates) {
    if (s > score) [method, score] = [m, s];
  }
  return { score, explanation: `'${na}' vs '${nb}' scored ${score} (${method})` };
}

/**
 * How well a company name fits a website or email domain. Every host label
 * left of the public suffix is tried (`carlosreyes.zumba.com` offers both
 * `carlosreyes` and `zumba`), against the name as-is and with its spaces
 * removed (`blue ridge` vs `blueridge`).
 */
export function nameDomainSimilarity(name: string | null | undefined, website: string | null | undefined): Similarity {
  const n = normalizeName(name);
  if (!n) return { score: 0, explanation: `${INSUFFICIENT_DATA}: no name`, insufficient: true };
  const d = normalizeDomain(website, 'url');
  if (!d.ok) return { score: 0, explanation: `${INSUFFICIENT_DATA}: ${d.reason}`, insufficient: true };
  const labels = hostLabels(d.domain);
  if (!labels.length) {
    return { score: 0, explanation: `${INSUFFICIENT_DATA}: no usable label in ${d.domain}`, insufficient: true };
  }

  const compact = n.replace(/ /g, '');
  let best = { score: -1, label: '' };
  for (const label of labels) {
    const s = Math.max(similarity(n, label).score, ratio(compact, label));
    if (s > best.score) best = { score: s, label };
  }
  return { score: best.score, explanation: `'${n}' vs domain label '${best.label}' of ${d.domain} scored ${best.score}` };
}

/** Website-to-website similarity: 100 on a shared root domain, else label similarity. */
export function domainSimilarity(a: string | null | undefined, b: string | null | undefined): Similarity {
  const da = normalizeDomain(a, 'url');
  const db = normalizeDomain(b, 'url');
  if (!da.ok) return { score: 0, explanation: `${INSUFFICIENT_DATA}: ${da.reason}`, insufficient: true };
  if (!db.ok) return { score: 0, explanation: `${INSUFFICIENT_DATA}: ${db.reason}`, insufficient: true };

  const ra = registrableDomain(da.domain);
  const rb = registrableDomain(db.domain);
  if (ra === rb) return { score: 100, explanation: `shared root domain ${ra}` };

  const labelA = domainLabel(ra) || ra;
  const labelB = domainLabel(rb) || rb;
  const score = Math.max(similarity(labelA, labelB).score, ratio(labelA, labelB));
  return { score, explanation: `root domains ${ra} vs ${rb}, labels '${labelA}' vs '${labelB}' scored ${score}` };
}
