import { describe, it, expect, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CLEAN_EXPLANATION, createDisallowList, loadDisallowList } from '../src/domain/badDomains.js';
import { ConfigurationError } from '../src/errors.js';
import { rec, testClassifier } from './fixtures.js';

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'disallow-'));

function writeTmp(name: string, content: string) {
  const file = path.join(tmp, name);
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

afterAll(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('disallow-list', () => {
  it('cleans raw entries', () => {
    const list = createDisallowList([' "Gmail.com"\t', '', 'www.yahoo.com', 'mailinator.com.']);
    expect([...list.domains].sort()).toEqual(['gmail.com', 'mailinator.com', 'yahoo.com']);
    expect(list.source).toBe('inline');
    expect(Object.isFrozen(list)).toBe(true);
  });

  it('loads the bundled list', async () => {
    const list = await loadDisallowList('data/bad_domains.csv');
    expect(list.domains.has('gmail.com')).toBe(true);
    expect(list.domains.has('ringcentral.com')).toBe(true);
    expect(list.domains.size).toBeGreaterThan(100);
  });

  it('refuses a missing, empty or wrongly shaped file', async () => {
    await expect(loadDisallowList(path.join(tmp, 'nope.csv'))).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadDisallowList(writeTmp('empty.csv', 'bad_domains\n'))).rejects.toThrow(/is empty/);
    await expect(loadDisallowList(writeTmp('wrong.csv', 'domain\ngmail.com\n'))).rejects.toThrow(
      "has no 'bad_domains' column",
    );
  });

  it('reads a list with a byte-order mark', async () => {
    const list = await loadDisallowList(writeTmp('bom.csv', '\uFEFFbad_domains\nGMAIL.com\n'));
    expect([...list.domains]).toEqual(['gmail.com']);
  });
});

describe('BadDomainClassifier', () => {
  const classifier = testClassifier();

  it('reports every offending field of a subdomain and root hit', () => {
    const flag = classifier.classify(rec({ email: 'jane@test.ringcentral.com', website: 'ringcentral.com' }));
    expect(flag.isBad).toBe(true);
    expect(flag.explanation).toBe(
      "Email domain 'test.ringcentral.com' matches disallowed domain 'ringcentral.com' and " +
        "Website domain 'ringcentral.com' matches disallowed domain 'ringcentral.com'",
    );
    expect(flag.matches).toEqual([
      { field: 'email', domain: 'test.ringcentral.com', root: 'ringcentral.com' },
      { field: 'website', domain: 'ringcentral.com', root: 'ringcentral.com' },
    ]);
  });

  it('catches a malformed suffix on an email', () => {
    const flag = classifier.classify(rec({ email: 'jane@gmail.comno' }));
    expect(flag.explanation).toBe("Email domain 'gmail.com' matches disallowed domain 'gmail.com'");
  });

  it('catches a junk tail glued onto a multi-label listed domain', () => {
    const flag = classifier.classify(rec({ website: 'yahoo.co.ukx' }));
    expect(flag.explanation).toBe("Website domain 'yahoo.co.ukx' matches disallowed domain 'yahoo.co.uk'");
  });

  it('falls back to the enrichment website when the website is empty', () => {
    const flag = classifier.classify(rec({ enrichment: { website: 'mail.gmail.com', address: {} } }));
    expect(flag.isBad).toBe(true);
    expect(flag.matches).toEqual([{ field: 'enrichmentWebsite', domain: 'mail.gmail.com', root: 'gmail.com' }]);
    expect(flag.explanation).toBe("Enrichment website domain 'mail.gmail.com' matches disallowed domain 'gmail.com'");
  });

  it('passes legitimate and look-alike domains', () => {
    expect(classifier.classify(rec({ website: 'west.acme.com', email: 'ops@acme.com' }))).toEqual({
      isBad: false,
      explanation: CLEAN_EXPLANATION,
      matches: [],
    });
    expect(classifier.classify(rec({ website: 'example.company' })).isBad).toBe(false);
    expect(classifier.classify(rec({ website: 'notgmail.com' })).isBad).toBe(false);
  });

  it('treats absent or unreadable values as clean', () => {
    expect(classifier.classify(rec()).explanation).toBe('no bad domain detected');
    expect(classifier.classify(rec({ email: 'not-an-email' })).isBad).toBe(false);
  });

  it('exposes list metadata', () => {
    expect(classifier.size).toBe(4);
    expect(classifier.source).toBe('test');
  });
});
