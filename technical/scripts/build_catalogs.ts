import fs from 'fs-extra';

import {
  buildCatalog,
  countCatalogNodes,
  listCatalogControls,
  type CatalogRow
} from './lib/catalog_builder.js';
import { loadPipelineConfig, type CatalogSourceConfig } from './lib/config.js';
import {
  getRunOptions,
  logWriteResult,
  repoPath,
  selectEntries,
  toPosixRelative,
  writeJsonFile
} from './lib/io.js';
import { toCatalogDocument } from './lib/oscal.js';
import { assertColumns, readWorkbookSheet } from './lib/workbook.js';

function toCatalogRows(rows: Record<string, string>[], config: CatalogSourceConfig): CatalogRow[] {
  const { columns } = config;
  return rows.map((row) => ({
    function: row[columns.function],
    category: row[columns.category],
    subcategory: row[columns.subcategory],
    examples: columns.examples ? row[columns.examples] : undefined
  }));
}

async function buildOne(config: CatalogSourceConfig, check: boolean): Promise<boolean> {
  const inputFile = repoPath(config.input);
  console.log(`Reading ${toPosixRelative(inputFile)} [${config.sheet}]...`);

  const table = await readWorkbookSheet(inputFile, { sheet: config.sheet, skipRows: config.skipRows });
  const columns = [config.columns.function, config.columns.category, config.columns.subcategory];
  if (config.columns.examples) {
    columns.push(config.columns.examples);
  }
  assertColumns(table, columns, `${config.id} (${config.input})`);

  const { catalog, dropped } = buildCatalog(toCatalogRows(table.rows, config), {
    groupIdStyle: config.groupIdStyle
  });

  if (dropped.length > 0) {
    console.warn(`Warning: ${dropped.length} row(s) dropped while building ${config.id}:`);
    for (const entry of dropped) {
      console.warn(`  - row ${entry.rowIndex + 1} (${entry.level}, ${entry.reason}): ${entry.text}`);
    }
  }

  const stat = await fs.stat(inputFile);
  const document = toCatalogDocument(catalog, {
    id: config.id,
    title: config.title,
    version: config.version,
    lastModified: new Date(stat.mtimeMs).toISOString()
  });

  const outFile = repoPath(config.output);
  const result = await writeJsonFile(outFile, document, { check });
  logWriteResult(
    check,
    outFile,
    result,
    `${catalog.functions.length} function(s), ${listCatalogControls(catalog).length} control(s), ${countCatalogNodes(catalog)} node(s)`
  );

  return result.changed;
}

async function main(): Promise<void> {
  const options = getRunOptions(process.argv.slice(2));
  const config = await loadPipelineConfig();

  let changes = 0;
  for (const entry of selectEntries(config.catalogs, options)) {
    if (await buildOne(entry, options.check)) {
      changes += 1;
    }
  }

  if (options.check) {
    if (changes > 0) {
      console.error(`\n${changes} catalog file(s) would be updated by build_catalogs.ts`);
      process.exit(1);
    }
    console.log('build_catalogs.ts check passed.');
    return;
  }

  console.log(`\nDone. ${changes} catalog file(s) updated by build_catalogs.ts.`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
