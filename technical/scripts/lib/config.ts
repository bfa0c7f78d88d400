import fs from 'fs-extra';

import {
  isGroupIdStyle,
  isNotationKind,
  type GroupIdStyle,
  type NotationKind
} from './control_identifier.js';
import { repoPath, requireInputFile, toPosixRelative } from './io.js';
import {
  isRelationshipKind,
  type RelationshipKind,
  type RelationshipPhrasesOverride
} from './relationship_classifier.js';

export const DEFAULT_CONFIG_PATH = ['library', 'config', 'frameworks.json'];

export interface CatalogColumns {
  function: string;
  category: string;
  subcategory: string;
  examples?: string;
}

export interface CatalogSourceConfig {
  id: string;
  title: string;
  version: string;
  input: string;
  sheet: string;
  skipRows: number;
  columns: CatalogColumns;
  groupIdStyle: GroupIdStyle;
  output: string;
}

export interface ClassificationConfig {
  changedElementsColumn: string;
  changeDetailsColumn: string;
  phrases: RelationshipPhrasesOverride;
}

export interface CrosswalkSourceConfig {
  id: string;
  title: string;
  version: string;
  input: string;
  sheet: string;
  skipRows: number;
  skipAfterHeader: number;
  columnNames?: string[];
  sourceColumn: string;
  targetColumn: string;
  sourceTitleColumn?: string;
  sourceFilter?: RegExp;
  sourceNotation: NotationKind;
  targetNotation: NotationKind;
  sourceResource: string;
  targetResource: string;
  sourceCatalog?: string;
  targetCatalog: string;
  defaultRelationship: RelationshipKind;
  confidence: string;
  coverage: string;
  includeTargetGaps: boolean;
  classification?: ClassificationConfig;
  output: string;
  mappingCollectionOutput?: string;
  relationshipsOutput?: string;
  summaryOutput?: string;
}

export interface PipelineConfig {
  catalogs: CatalogSourceConfig[];
  crosswalks: CrosswalkSourceConfig[];
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

function requireRecord(value: unknown, where: string): Record<string, unknown> {
  const record = asRecord(value);
  if (!record) {
    throw new Error(`${where} must be an object`);
  }
  return record;
}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalString(
  record: Record<string, unknown>,
  key: string,
  where: string
): string | undefined {
  if (record[key] === undefined) {
    return undefined;
  }
  return requireString(record, key, where);
}

function optionalNumber(
  record: Record<string, unknown>,
  key: string,
  where: string,
  fallback: number
): number {
  const value = record[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${where}.${key} must be a non-negative integer`);
  }
  return value;
}

function optionalBoolean(record: Record<string, unknown>, key: string, where: string): boolean {
  const value = record[key];
  if (value === undefined) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`${where}.${key} must be true or false`);
  }
  return value;
}

function optionalStringList(
  record: Record<string, unknown>,
  key: string,
  where: string
): string[] | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`${where}.${key} must be a list of strings`);
  }
  return value;
}

function requireNotation(record: Record<string, unknown>, key: string, where: string): NotationKind {
  const value = requireString(record, key, where);
  if (!isNotationKind(value)) {
    throw new Error(
      `${where}.${key} has unknown notation '${value}'. Expected dotted-hierarchy|dash-enhancement|triple-segment`
    );
  }
  return value;
}

function requireRelationship(
  record: Record<string, unknown>,
  key: string,
  where: string
): RelationshipKind {
  const value = requireString(record, key, where);
  if (!isRelationshipKind(value)) {
    throw new Error(`${where}.${key} has unknown relationship '${value}'`);
  }
  return value;
}

function optionalPattern(
  record: Record<string, unknown>,
  key: string,
  where: string
): RegExp | undefined {
  const value = optionalString(record, key, where);
  if (value === undefined) {
    return undefined;
  }
  try {
    return new RegExp(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${where}.${key} is not a valid regular expression: ${reason}`);
  }
}

function parsePhrases(value: unknown, where: string): RelationshipPhrasesOverride {
  if (value === undefined) {
    return {};
  }

  const record = requireRecord(value, where);
  const override: RelationshipPhrasesOverride = {
    noChangeMarker: optionalString(record, 'no_change_marker', where),
    newControl: optionalStringList(record, 'new_control', where),
    neutral: optionalStringList(record, 'neutral', where),
    adds: optionalStringList(record, 'adds', where),
    removes: optionalStringList(record, 'removes', where),
    changesControl: optionalStringList(record, 'changes_control', where)
  };

  if (record.lifecycle !== undefined) {
    const lifecycleWhere = `${where}.lifecycle`;
    const lifecycle = requireRecord(record.lifecycle, lifecycleWhere);
    override.lifecycle = {
      withdrawnInSource: optionalString(lifecycle, 'withdrawn_in_source', lifecycleWhere),
      previouslyWithdrawnInSource: optionalString(
        lifecycle,
        'previously_withdrawn_in_source',
        lifecycleWhere
      ),
      restoredInTarget: optionalString(lifecycle, 'restored_in_target', lifecycleWhere),
      withdrawnMarker: optionalString(lifecycle, 'withdrawn_marker', lifecycleWhere)
    };
  }

  return override;
}

function parseCatalog(value: unknown, where: string): CatalogSourceConfig {
  const record = requireRecord(value, where);
  const columnsWhere = `${where}.columns`;
  const columns = requireRecord(record.columns, columnsWhere);
  const groupIdStyle = optionalString(record, 'group_id_style', where) ?? 'abbreviation';
  if (!isGroupIdStyle(groupIdStyle)) {
    throw new Error(`${where}.group_id_style must be abbreviation|slug, got '${groupIdStyle}'`);
  }

  return {
    id: requireString(record, 'id', where),
    title: requireString(record, 'title', where),
    version: requireString(record, 'version', where),
    input: requireString(record, 'input', where),
    sheet: requireString(record, 'sheet', where),
    skipRows: optionalNumber(record, 'skip_rows', where, 0),
    columns: {
      function: requireString(columns, 'function', columnsWhere),
      category: requireString(columns, 'category', columnsWhere),
      subcategory: requireString(columns, 'subcategory', columnsWhere),
      examples: optionalString(columns, 'examples', columnsWhere)
    },
    groupIdStyle,
    output: requireString(record, 'output', where)
  };
}

function parseClassification(value: unknown, where: string): ClassificationConfig | undefined {
  if (value === undefined) {
    return undefined;
  }
  const record = requireRecord(value, where);
  return {
    changedElementsColumn: requireString(record, 'changed_elements_column', where),
    changeDetailsColumn: requireString(record, 'change_details_column', where),
    phrases: parsePhrases(record.phrases, `${where}.phrases`)
  };
}

function parseCrosswalk(value: unknown, where: string): CrosswalkSourceConfig {
  const record = requireRecord(value, where);

  return {
    id: requireString(record, 'id', where),
    title: requireString(record, 'title', where),
    version: requireString(record, 'version', where),
    input: requireString(record, 'input', where),
    sheet: requireString(record, 'sheet', where),
    skipRows: optionalNumber(record, 'skip_rows', where, 0),
    skipAfterHeader: optionalNumber(record, 'skip_after_header', where, 0),
    columnNames: optionalStringList(record, 'column_names', where),
    sourceColumn: requireString(record, 'source_column', where),
    targetColumn: requireString(record, 'target_column', where),
    sourceTitleColumn: optionalString(record, 'source_title_column', where),
    sourceFilter: optionalPattern(record, 'source_filter', where),
    sourceNotation: requireNotation(record, 'source_notation', where),
    targetNotation: requireNotation(record, 'target_notation', where),
    sourceResource: requireString(record, 'source_resource', where),
    targetResource: requireString(record, 'target_resource', where),
    sourceCatalog: optionalString(record, 'source_catalog', where),
    targetCatalog: requireString(record, 'target_catalog', where),
    defaultRelationship: requireRelationship(record, 'default_relationship', where),
    confidence: optionalString(record, 'confidence', where) ?? '100%',
    coverage: typeof record.coverage === 'string' ? record.coverage : '',
    includeTargetGaps: optionalBoolean(record, 'include_target_gaps', where),
    classification: parseClassification(record.classification, `${where}.classification`),
    output: requireString(record, 'output', where),
    mappingCollectionOutput: optionalString(record, 'mapping_collection_output', where),
    relationshipsOutput: optionalString(record, 'relationships_output', where),
    summaryOutput: optionalString(record, 'summary_output', where)
  };
}

function assertUniqueIds(entries: { id: string }[], where: string): void {
  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.id)) {
      throw new Error(`${where} has duplicate id '${entry.id}'`);
    }
    seen.add(entry.id);
  }
}

export function parsePipelineConfig(data: unknown, label: string): PipelineConfig {
  const record = requireRecord(data, label);
  const catalogs = record.catalogs ?? [];
  const crosswalks = record.crosswalks ?? [];

  if (!Array.isArray(catalogs)) {
    throw new Error(`${label}: catalogs must be a list`);
  }
  if (!Array.isArray(crosswalks)) {
    throw new Error(`${label}: crosswalks must be a list`);
  }

  const config: PipelineConfig = {
    catalogs: catalogs.map((entry, index) => parseCatalog(entry, `${label}: catalogs[${index}]`)),
    crosswalks: crosswalks.map((entry, index) =>
      parseCrosswalk(entry, `${label}: crosswalks[${index}]`)
    )
  };

  assertUniqueIds(config.catalogs, `${label}: catalogs`);
  assertUniqueIds(config.crosswalks, `${label}: crosswalks`);
  return config;
}

export async function loadPipelineConfig(
  filePath: string = repoPath(...DEFAULT_CONFIG_PATH)
): Promise<PipelineConfig> {
  await requireInputFile(filePath, 'Pipeline configuration');
  const data: unknown = await fs.readJson(filePath);
  return parsePipelineConfig(data, toPosixRelative(filePath));
}
