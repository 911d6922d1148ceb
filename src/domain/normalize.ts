import { isKnownSuffix, publicSuffixOf } from './suffixes.js';

export type DomainResult = { ok: true; domain: string } | { ok: false; reason: string };
export type DomainSource = 'auto' | 'email' | 'url';

const HOST_RE = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)+$/;
// Tail allowed after a known suffix before we call it a data-entry artifact (gmail.comno).
const REPAIR_TAIL = /^[a-z0-9]{1,4}$/;
const MIN_REPAIR_SUFFIX = 3;

/**
 * Extract a lowercase, scheme-less, `www.`-less domain from a URL or an
 * email address.
 *
 * - Emails (anything with `@` and no scheme) keep the part after the last `@`.
 * - URLs may lack a scheme, carry a doubled or colon-less scheme, a port,
 *   credentials, a path, query or fragment.
 * - A last label that is not a known suffix but starts with one followed by
 *   a short alphanumeric tail is truncated to the longest such suffix
 *   (`gmail.comno` becomes `gmail.com`). Suffixes are those of the public
 *   suffix list, so real TLDs such as `healthcare` are never truncated.
 *
 * Idempotent: feeding a returned domain back in returns it unchanged.
 */
export function normalizeDomain(input: string | null | undefined, source: DomainSource = 'auto'): DomainResult {
  if (typeof input !== 'string') return { ok: false, reason: 'no value' };
  const raw = input.trim();
  if (!raw) return { ok: false, reason: 'empty value' };

  const asEmail = source === 'email' || (source === 'auto' && !raw.includes('://') && raw.includes('@'));
  let host: string;
  if (asEmail) {
    const at = raw.lastIndexOf('@');
    if (at < 0) return { ok: false, reason: `no @ in email '${raw}'` };
    host = raw.slice(at + 1).split(/[\s>;,]/)[0].toLowerCase();
  } else {
    host = extractHost(raw);
  }
  host = host.replace(/\.+$/, '').replace(/^(?:www\.)+/, '');
  if (!HOST_RE.test(host)) return { ok: false, reason: `no domain could be extracted from '${raw}'` };
  return { ok: true, domain: repairMalformedSuffix(host) };
}

export function repairMalformedSuffix(host: string): string {
  const labels = host.split('.');
  const last = labels[labels.length - 1];
  if (labels.length < 2 || isKnownSuffix(last)) return host;
  // Longest known suffix first; the junk tail is 1-4 characters.
  for (let k = last.length - 1; k >= Math.max(MIN_REPAIR_SUFFIX, last.length - 4); k--) {
    if (!REPAIR_TAIL.test(last.slice(k))) continue;
    const candidate = last.slice(0, k);
    if (isKnownSuffix(candidate)) {
      labels[labels.length - 1] = candidate;
      return labels.join('.');
    }
  }
  return host;
}

/** `west.acme.co.uk` → `acme.co.uk`; unknown suffixes fall back to the last two labels. */
export function registrableDomain(domain: string): string {
  const suffix = publicSuffixOf(domain);
  const take = suffix ? suffix.split('.').length + 1 : 2;
  return domain.split('.').slice(-take).join('.');
}

/**
 * Labels left of the public suffix, alphanumerics only, outermost last.
 * `carlos-reyes.zumba.com` → `['carlosreyes', 'zumba']`.
 */
export function hostLabels(domain: string): string[] {
  const suffix = publicSuffixOf(domain);
  const labels = domain.split('.');
  const core = labels.slice(0, labels.length - (suffix ? suffix.split('.').length : 1));
  return core
    .filter((l) => l !== 'www')
    .map((l) => l.replace(/[^a-z0-9]/g, ''))
    .filter(Boolean);
}

/** The registrable label, i.e. the company-ish part of the domain (`acme`). */
export function domainLabel(domain: string): string {
  const labels = hostLabels(domain);
  return labels.length ? labels[labels.length - 1] : '';
}

function preSanitizeUrl(u: string) {
  let s = (u || '').trim();
  // Fix duplicated protocol like: https://https://example.com or http://http://example.com
  if (/^https?:\/\/https?:\/\//i.test(s)) {
    s = 'https://' + s.replace(/^https?:\/\/https?:\/\//i, '');
  }
  // Fix mixed form like 'https://https//example.com' (second scheme missing colon)
  s = s.replace(/:\/\/https\/\//i, '://');
  s = s.replace(/:\/\/http\/\//i, '://');
  // Fix missing colon like https//example.com or http//example.com
  s = s.replace(/^https\/\//i, 'https://');
  s = s.replace(/^http\/\//i, 'http://');
  return s;
}

function extractHost(u: string) {
  try {
    const fixed = preSanitizeUrl(u);
    const url = new URL(fixed.includes('://') ? fixed : `https://${fixed}`);
    return url.hostname.toLowerCase();
  } catch {
    return u.toLowerCase().replace(/^[a-z][a-z0-9+.-]*:\/\//, '').split(/[/?#]/)[0];
  }
}
