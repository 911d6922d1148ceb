import { ConfigurationError, describeFault, MissingDataError } from '../errors.js';
import { hasShell, sameRecordId } from '../records/ids.js';
import { customerConsistency, customerShellCoherence } from '../matching/coherence.js';
import { addressConsistency, DEFAULT_ADDRESS_OPTIONS } from '../matching/address.js';
import { childLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { BadDomainClassifier } from '../domain/badDomains.js';
import type { AddressOptions } from '../matching/address.js';
import type {
  AddressConsistencyFlag,
  BadDomainFlag,
  CompanyRecord,
  CustomerConsistencyFlag,
  CustomerShellCoherenceFlag,
  RelationshipFlags,
  ParentLookup,
} from '../types.js';

export type EvaluationStage = 'pending' | 'bad-domain-checked' | 'terminated' | 'shell-checked' | 'flags-complete';

export interface AggregatorOptions {
  classifier: BadDomainClassifier;
  address?: AddressOptions;
  logger?: Logger;
}

function requireParent(record: CompanyRecord, parent: ParentLookup): CompanyRecord {
  if (!parent) throw new MissingDataError(`parent record ${record.parentId ?? ''} was not supplied`);
  if ('unresolved' in parent) throw new MissingDataError(`parent record ${parent.unresolved} could not be resolved`);
  if (!sameRecordId(parent.id, record.parentId)) {
    throw new MissingDataError(`supplied parent ${parent.id} is not the linked parent ${record.parentId ?? ''}`);
  }
  return parent;
}

/**
 * Runs the flag pipeline for one record in its fixed order:
 * bad domain (gate) → has shell → customer consistency → (with a shell)
 * customer/shell coherence and address consistency.
 *
 * Every step is isolated: a throw becomes a degraded flag (score 0 or
 * `false`) whose explanation names the fault, and evaluation carries on.
 * A `ConfigurationError` is not a per-record fault and propagates.
 */
export class FlagAggregator {
  private readonly classifier: BadDomainClassifier;
  private readonly address: AddressOptions;
  private readonly log: Logger;

  constructor(options: AggregatorOptions) {
    this.classifier = options.classifier;
    this.address = options.address ?? DEFAULT_ADDRESS_OPTIONS;
    this.log = options.logger ?? childLogger('flags');
  }

  evaluate(record: CompanyRecord, parent?: ParentLookup): RelationshipFlags {
    const recordId = typeof record?.id === 'string' ? record.id : '(unknown)';
    let stage: EvaluationStage = 'pending';
    const advance = (next: EvaluationStage) => {
      this.log.debug({ recordId, from: stage, to: next }, 'flag stage');
      stage = next;
    };

    const badDomain = this.guard<BadDomainFlag>(
      recordId,
      'bad domain',
      () => this.classifier.classify(record),
      (fault) => ({ isBad: false, explanation: `bad domain check failed (${fault}); treated as clean`, matches: [] }),
    );
    advance('bad-domain-checked');
    if (badDomain.isBad) {
      advance('terminated');
      return { stage: 'terminated', badDomain };
    }

    const shell = this.guard(recordId, 'has shell', () => hasShell(record), () => false);
    advance('shell-checked');

    const consistency = this.guard<CustomerConsistencyFlag>(
      recordId,
      'customer consistency',
      () => customerConsistency(record),
      (fault) => ({ score: 0, explanation: `customer consistency could not be computed: ${fault}`, fields: null }),
    );

    if (!shell) {
      advance('flags-complete');
      return { stage: 'complete', badDomain, hasShell: false, customerConsistency: consistency };
    }

    const coherence = this.guard<CustomerShellCoherenceFlag>(
      recordId,
      'customer-shell coherence',
      () => customerShellCoherence(record, requireParent(record, parent)),
      (fault) => ({
        score: 0,
        explanation: `customer-shell coherence could not be computed: ${fault}`,
        nameScore: null,
        websiteScore: null,
        fields: [],
      }),
    );
    const address = this.guard<AddressConsistencyFlag>(
      recordId,
      'address consistency',
      () => addressConsistency(record, requireParent(record, parent), this.address),
      (fault) => ({
        isConsistent: false,
        explanation: `address consistency could not be computed: ${fault}`,
        fieldsCompared: null,
      }),
    );
    advance('flags-complete');
    return {
      stage: 'complete',
      badDomain,
      hasShell: true,
      customerConsistency: consistency,
      customerShellCoherence: coherence,
      addressConsistency: address,
    };
  }

  private guard<T>(recordId: string, flag: string, compute: () => T, fallback: (fault: string) => T): T {
    try {
      return compute();
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      const fault = describeFault(err);
      this.log.warn({ recordId, flag, err }, `degraded ${flag} flag: ${fault}`);
      return fallback(fault);
    }
  }
}
