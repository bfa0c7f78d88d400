import fs from 'fs-extra';

import { loadPipelineConfig, type CrosswalkSourceConfig } from './lib/config.js';
import type { CrosswalkResult } from './lib/crosswalk_builder.js';
import {
  buildConfiguredCrosswalk,
  loadCrosswalkSource,
  type CrosswalkSource
} from './lib/crosswalk_pipeline.js';
import {
  getRunOptions,
  logWriteResult,
  repoPath,
  selectEntries,
  toPosixRelative,
  writeJsonFile,
  writeTextFile,
  type WriteResult
} from './lib/io.js';
import { formatMappingCsv } from './lib/mapping_output.js';
import { buildMappingCollection, type MappingResources } from './lib/oscal.js';
import { buildRelationshipSummary, crosswalkStats } from './lib/relationship_summary.js';

const MAX_LISTED = 10;

function warnList(heading: string, items: string[]): void {
  if (items.length === 0) {
    return;
  }
  console.warn(`Warning: ${items.length} ${heading}:`);
  for (const item of items.slice(0, MAX_LISTED)) {
    console.warn(`  - ${item}`);
  }
  if (items.length > MAX_LISTED) {
    console.warn(`  ... and ${items.length - MAX_LISTED} more`);
  }
}

function reportCrosswalk(config: CrosswalkSourceConfig, source: CrosswalkSource, result: CrosswalkResult): void {
  if (source.filteredOut > 0) {
    console.log(`Skipped ${source.filteredOut} row(s) not matching ${String(config.sourceFilter)}`);
  }
  warnList('target id(s) not found in the target catalog', result.unmatchedTargetIds);
  warnList(
    'control(s) need manual review',
    result.reviewRequired.map((entry) => `${entry.sourceId} (${entry.relationship})`)
  );
  if (result.unmappedSourceCount > 0) {
    console.log(`${result.unmappedSourceCount} source control(s) have no mapping`);
  }
}

async function buildOne(config: CrosswalkSourceConfig, check: boolean): Promise<number> {
  console.log(`Building crosswalk ${config.id}...`);
  const source = await loadCrosswalkSource(config);
  const result = await buildConfiguredCrosswalk(config, source);
  reportCrosswalk(config, source, result);

  const resources: MappingResources = {
    sourceResource: config.sourceResource,
    targetResource: config.targetResource
  };
  const results: WriteResult[] = [];

  const csvFile = repoPath(config.output);
  const csvResult = await writeTextFile(csvFile, formatMappingCsv(result, resources), { check });
  logWriteResult(
    check,
    csvFile,
    csvResult,
    `${result.mapped.length} mapped, ${result.sourceGaps.length} source gap(s), ${result.targetGaps.length} target gap(s)`
  );
  results.push(csvResult);

  if (config.mappingCollectionOutput) {
    const stat = await fs.stat(repoPath(config.input));
    const document = buildMappingCollection(result, resources, {
      id: config.id,
      title: config.title,
      version: config.version,
      lastModified: new Date(stat.mtimeMs).toISOString()
    });
    const jsonFile = repoPath(config.mappingCollectionOutput);
    const jsonResult = await writeJsonFile(jsonFile, document, { check });
    logWriteResult(check, jsonFile, jsonResult);
    results.push(jsonResult);
  }

  if (config.summaryOutput) {
    if (!config.classification) {
      throw new Error(
        `${config.id}: summary_output needs a classification block (${toPosixRelative(repoPath(config.summaryOutput))})`
      );
    }
    const summary = buildRelationshipSummary(
      config.title,
      source.comparisons,
      crosswalkStats(source.comparisons, result)
    );
    const summaryFile = repoPath(config.summaryOutput);
    const summaryResult = await writeTextFile(summaryFile, summary, { check });
    logWriteResult(check, summaryFile, summaryResult);
    results.push(summaryResult);
  }

  return results.filter((entry) => entry.changed).length;
}

async function main(): Promise<void> {
  const options = getRunOptions(process.argv.slice(2));
  const config = await loadPipelineConfig();

  let changes = 0;
  for (const entry of selectEntries(config.crosswalks, options)) {
    changes += await buildOne(entry, options.check);
  }

  if (options.check) {
    if (changes > 0) {
      console.error(`\n${changes} crosswalk file(s) would be updated by build_crosswalks.ts`);
      process.exit(1);
    }
    console.log('build_crosswalks.ts check passed.');
    return;
  }

  console.log(`\nDone. ${changes} crosswalk file(s) updated by build_crosswalks.ts.`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
