import { loadPipelineConfig, type CrosswalkSourceConfig } from './lib/config.js';
import { canonicalize } from './lib/control_identifier.js';
import { loadCrosswalkSource } from './lib/crosswalk_pipeline.js';
import {
  getRunOptions,
  logWriteResult,
  repoPath,
  selectEntries,
  writeJsonFile
} from './lib/io.js';
import { RELATIONSHIP_KINDS, countRelationships } from './lib/relationship_classifier.js';

async function classifyOne(
  config: CrosswalkSourceConfig,
  relationshipsOutput: string,
  check: boolean
): Promise<boolean> {
  console.log(`Classifying relationships for ${config.id}...`);
  const source = await loadCrosswalkSource(config);
  const counts = countRelationships(source.comparisons.map((row) => row.relationship));

  console.log('Relationship distribution:');
  for (const kind of RELATIONSHIP_KINDS) {
    if (counts[kind] > 0) {
      console.log(`  ${kind.padEnd(26)} ${counts[kind]}`);
    }
  }

  const review = source.comparisons.filter((row) => row.relationship === 'withdrawn-error');
  if (review.length > 0) {
    console.warn(`Warning: ${review.length} control(s) with unexpected withdrawn combinations need manual review:`);
    for (const row of review) {
      console.warn(`  - ${row.identifier}: ${row.changeDetails.replace(/\s+/g, ' ').trim()}`);
    }
  }

  const document = {
    crosswalk: config.id,
    title: config.title,
    total: source.comparisons.length,
    distribution: counts,
    review_required: review.map((row) => row.identifier),
    rows: source.comparisons.map((row) => ({
      source: row.identifier,
      source_id: canonicalize(row.identifier, config.sourceNotation),
      source_title: row.title,
      target: row.targetIdentifier,
      target_id: canonicalize(row.targetIdentifier, config.targetNotation),
      relationship: row.relationship
    }))
  };

  const outFile = repoPath(relationshipsOutput);
  const result = await writeJsonFile(outFile, document, { check });
  logWriteResult(check, outFile, result, `${document.total} row(s)`);
  return result.changed;
}

async function main(): Promise<void> {
  const options = getRunOptions(process.argv.slice(2));
  const config = await loadPipelineConfig();

  let changes = 0;
  for (const entry of selectEntries(config.crosswalks, options)) {
    if (!entry.classification || !entry.relationshipsOutput) {
      continue;
    }
    if (await classifyOne(entry, entry.relationshipsOutput, options.check)) {
      changes += 1;
    }
  }

  if (options.check) {
    if (changes > 0) {
      console.error(`\n${changes} relationship file(s) would be updated by classify_relationships.ts`);
      process.exit(1);
    }
    console.log('classify_relationships.ts check passed.');
    return;
  }

  console.log(`\nDone. ${changes} relationship file(s) updated by classify_relationships.ts.`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
