import { parse } from 'tldts';

// ICANN section of the public suffix list only; private entries such as
// blogspot.com stay registrable domains of their own.
const OPTIONS = { allowPrivateDomains: false, validateHostname: false } as const;

/** Whether `suffix` (`com`, `co.uk`, `healthcare`) is a listed public suffix. */
export function isKnownSuffix(suffix: string): boolean {
  if (!suffix) return false;
  const r = parse(`x.${suffix}`, OPTIONS);
  return r.isIcann === true && r.publicSuffix !== null && r.publicSuffix.endsWith(suffix);
}

/** Public suffix of a host, or null when its last label is not a listed one. */
export function publicSuffixOf(host: string): string | null {
  const r = parse(host, OPTIONS);
  if (r.isIcann !== true || !r.publicSuffix || r.publicSuffix === host) return null;
  return r.publicSuffix;
}
