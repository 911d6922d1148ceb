#!/usr/bin/env node
import 'dotenv/config';
import cliProgress from 'cli-progress';
import { loadConfig } from '../config.js';
import { BadDomainClassifier, loadDisallowList } from '../domain/badDomains.js';
import { FlagAggregator } from '../flags/aggregate.js';
import { evaluateBatch, summarize } from '../flags/batch.js';
import { recordFromCsvRow } from '../records/csvRows.js';
import { parseRecord } from '../records/schema.js';
import { InMemoryRecordSource, resolveParents } from '../records/source.js';
import { buildReasoningPayload } from '../reasoning/payload.js';
import { describeFault } from '../errors.js';
import { readCsv, writeJson } from '../utils/csv.js';
import { logger } from '../utils/logger.js';
import type { CompanyRecord } from '../types.js';

/**
 * Evaluate every record of a CSV export and write flags plus reasoning
 * payloads as JSON. Parents are resolved among the rows of the same file.
 *
 * Usage: evaluate [records.csv] [out.json]
 * (or RECORDS_INPUT / FLAGS_OUT in the environment)
 */
async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  const inputPath = process.env.RECORDS_INPUT || process.argv[2] || 'data/records.csv';
  const outPath = process.env.FLAGS_OUT || process.argv[3] || 'out/flags.json';

  const list = await loadDisallowList(config.badDomainsPath);
  const aggregator = new FlagAggregator({
    classifier: new BadDomainClassifier(list),
    address: { postalTolerance: config.postalTolerance },
  });

  const rows = await readCsv(inputPath);
  const records: CompanyRecord[] = [];
  rows.forEach((row, i) => {
    try {
      records.push(parseRecord(recordFromCsvRow(row)));
    } catch (e) {
      logger.warn(`Skipping row ${i + 2} of ${inputPath}: ${describeFault(e)}`);
    }
  });

  const inputs = await resolveParents(records, new InMemoryRecordSource(records));
  const bar = new cliProgress.SingleBar(
    { hideCursor: true, format: '[{bar}] {value}/{total} | {percentage}%' },
    cliProgress.Presets.shades_classic,
  );
  bar.start(inputs.length, 0);
  const t0 = Date.now();
  const results = await evaluateBatch(aggregator, inputs, {
    concurrency: config.concurrency,
    onSettled: (done) => bar.update(done),
  });
  bar.stop();

  const summary = { ...summarize(results), skippedRows: rows.length - records.length, elapsedMs: Date.now() - t0 };
  writeJson(outPath, {
    summary,
    results: results.map((r) => ({
      id: r.record.id,
      flags: r.flags,
      payload: buildReasoningPayload(r.record, r.parent, r.flags),
    })),
  });
  logger.info(summary, `Evaluated ${results.length} records -> ${outPath}`);
}

main().catch((e) => {
  logger.fatal({ err: e }, 'evaluation failed');
  process.exit(1);
});
