import fs from 'fs-extra';

import type { CrosswalkSourceConfig } from './config.js';
import { buildCrosswalk, type CrosswalkInputRow, type CrosswalkResult } from './crosswalk_builder.js';
import { repoPath, requireInputFile, toPosixRelative } from './io.js';
import { collectCatalogIds } from './oscal.js';
import {
  DEFAULT_RELATIONSHIP_PHRASES,
  classifyComparisonRow,
  mergeRelationshipPhrases,
  type ClassifiedComparisonRow,
  type RelationshipPhrases
} from './relationship_classifier.js';
import { assertColumns, readWorkbookSheet, type SheetTable } from './workbook.js';

export interface CrosswalkSource {
  rows: CrosswalkInputRow[];
  comparisons: ClassifiedComparisonRow[];
  filteredOut: number;
}

export function resolvePhrases(config: CrosswalkSourceConfig): RelationshipPhrases {
  return mergeRelationshipPhrases(DEFAULT_RELATIONSHIP_PHRASES, config.classification?.phrases);
}

function requiredColumns(config: CrosswalkSourceConfig): string[] {
  const columns = [config.sourceColumn, config.targetColumn];
  if (config.sourceTitleColumn) {
    columns.push(config.sourceTitleColumn);
  }
  if (config.classification) {
    columns.push(
      config.classification.changedElementsColumn,
      config.classification.changeDetailsColumn
    );
  }
  return columns;
}

/**
 * Turns the configured sheet into crosswalk rows. When the crosswalk has a
 * classification block every row is also classified and returned in
 * `comparisons`; rows whose raw source id fails `sourceFilter` are skipped.
 */
export function extractCrosswalkSource(
  table: SheetTable,
  config: CrosswalkSourceConfig
): CrosswalkSource {
  assertColumns(table, requiredColumns(config), `${config.id} (${config.input})`);

  const phrases = resolvePhrases(config);
  const rows: CrosswalkInputRow[] = [];
  const comparisons: ClassifiedComparisonRow[] = [];
  let filteredOut = 0;

  for (const row of table.rows) {
    const source = (row[config.sourceColumn] ?? '').trim();
    if (!source) {
      continue;
    }
    if (config.sourceFilter && !config.sourceFilter.test(source)) {
      filteredOut += 1;
      continue;
    }

    const target = (row[config.targetColumn] ?? '').trim();
    if (!config.classification) {
      rows.push({ source, target });
      continue;
    }

    const classified = classifyComparisonRow(
      {
        identifier: source,
        title: config.sourceTitleColumn ? (row[config.sourceTitleColumn] ?? '').trim() : '',
        targetIdentifier: target,
        changedElements: row[config.classification.changedElementsColumn] ?? '',
        changeDetails: row[config.classification.changeDetailsColumn] ?? ''
      },
      phrases
    );
    comparisons.push(classified);
    rows.push({ source, target, relationship: classified.relationship });
  }

  return { rows, comparisons, filteredOut };
}

export async function loadCrosswalkSource(config: CrosswalkSourceConfig): Promise<CrosswalkSource> {
  const table = await readWorkbookSheet(repoPath(config.input), {
    sheet: config.sheet,
    skipRows: config.skipRows,
    skipAfterHeader: config.skipAfterHeader,
    columnNames: config.columnNames
  });
  return extractCrosswalkSource(table, config);
}

export async function loadCatalogIds(filePath: string): Promise<Set<string>> {
  await requireInputFile(filePath, 'Catalog');
  const document: unknown = await fs.readJson(filePath);
  const ids = collectCatalogIds(document);
  if (ids.size === 0) {
    throw new Error(`Catalog has no controls: ${toPosixRelative(filePath)}`);
  }
  return ids;
}

export async function buildConfiguredCrosswalk(
  config: CrosswalkSourceConfig,
  source: CrosswalkSource
): Promise<CrosswalkResult> {
  const targetCatalogIds = await loadCatalogIds(repoPath(config.targetCatalog));
  const sourceCatalogIds = config.sourceCatalog
    ? await loadCatalogIds(repoPath(config.sourceCatalog))
    : undefined;

  return buildCrosswalk(source.rows, {
    sourceNotation: config.sourceNotation,
    targetNotation: config.targetNotation,
    targetCatalogIds,
    sourceCatalogIds,
    defaultRelationship: config.defaultRelationship,
    confidence: config.confidence,
    coverage: config.coverage,
    includeTargetGaps: config.includeTargetGaps
  });
}
