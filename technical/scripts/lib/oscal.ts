import { v5 as uuidv5 } from 'uuid';

import type { Catalog, ControlPart } from './catalog_builder.js';
import type { CrosswalkResult, MappingRecord } from './crosswalk_builder.js';

export const OSCAL_VERSION = '1.1.2';

// ── Catalog ──────────────────────────────────────────────────────────

export interface OscalMetadata {
  title: string;
  'last-modified': string;
  version: string;
  'oscal-version': string;
}

export interface OscalControl {
  id: string;
  title: string;
  parts: ControlPart[];
}

export interface OscalCategoryGroup {
  id: string;
  class: 'category';
  title: string;
  controls: OscalControl[];
}

export interface OscalFunctionGroup {
  id: string;
  class: 'function';
  title: string;
  groups: OscalCategoryGroup[];
}

export interface OscalCatalogDocument {
  catalog: {
    uuid: string;
    metadata: OscalMetadata;
    groups: OscalFunctionGroup[];
  };
}

export interface DocumentMetadata {
  id: string;
  title: string;
  version: string;
  lastModified: string;
}

// Fixed namespace for every name-based uuid this project emits.
export const OSCAL_UUID_NAMESPACE = '6f1c2b1e-3d4a-4c5b-9e8f-0a1b2c3d4e5f';

/**
 * Name-based (v5) uuid so regenerated artifacts stay byte-identical.
 */
export function deterministicUuid(namespace: string, name: string): string {
  return uuidv5(`${namespace}:${name}`, OSCAL_UUID_NAMESPACE);
}

function buildMetadata(meta: DocumentMetadata): OscalMetadata {
  return {
    title: meta.title,
    'last-modified': meta.lastModified,
    version: meta.version,
    'oscal-version': OSCAL_VERSION
  };
}

export function toCatalogDocument(catalog: Catalog, meta: DocumentMetadata): OscalCatalogDocument {
  return {
    catalog: {
      uuid: deterministicUuid('catalog', `${meta.id}@${meta.version}`),
      metadata: buildMetadata(meta),
      groups: catalog.functions.map((fn): OscalFunctionGroup => ({
        id: fn.id,
        class: 'function',
        title: fn.title,
        groups: fn.categories.map((category): OscalCategoryGroup => ({
          id: category.id,
          class: 'category',
          title: category.title,
          controls: category.controls.map((control): OscalControl => ({
            id: control.id,
            title: control.title,
            parts: control.parts.map((part) => ({ ...part }))
          }))
        }))
      }))
    }
  };
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Every object carrying both an `id` and a `title` is a catalog node
 * (group or control), however deeply the catalog nests them.
 */
export function collectCatalogIds(document: unknown): Set<string> {
  const ids = new Set<string>();

  const visit = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(visit);
      return;
    }

    const record = asRecord(value);
    if (!record) {
      return;
    }

    if (typeof record.id === 'string' && 'title' in record) {
      ids.add(record.id);
    }
    Object.values(record).forEach(visit);
  };

  visit(document);
  return ids;
}

// ── Mapping collection ───────────────────────────────────────────────

export interface OscalMapItem {
  type: 'control';
  'id-ref': string;
}

export interface OscalMapEntry {
  uuid: string;
  relationship: string;
  sources: OscalMapItem[];
  targets: OscalMapItem[];
  props?: { name: string; value: string }[];
}

export interface OscalGapSummary {
  uuid: string;
  'unmapped-controls': OscalMapItem[];
}

export interface OscalMapping {
  uuid: string;
  'source-resource': { type: 'catalog'; href: string };
  'target-resource': { type: 'catalog'; href: string };
  maps: OscalMapEntry[];
  'source-gap-summary'?: OscalGapSummary;
  'target-gap-summary'?: OscalGapSummary;
}

export interface OscalMappingCollectionDocument {
  'mapping-collection': {
    uuid: string;
    metadata: OscalMetadata;
    mappings: OscalMapping[];
  };
}

export interface MappingResources {
  sourceResource: string;
  targetResource: string;
}

function controlRefs(ids: string[]): OscalMapItem[] {
  return ids.map((id): OscalMapItem => ({ type: 'control', 'id-ref': id }));
}

function mapEntry(mappingId: string, record: MappingRecord): OscalMapEntry {
  const entry: OscalMapEntry = {
    uuid: deterministicUuid(mappingId, record.sourceId),
    relationship: record.relationship,
    sources: controlRefs([record.sourceId]),
    targets: controlRefs(record.targetIds)
  };

  const props = [
    { name: 'confidence-score', value: record.confidence },
    { name: 'coverage', value: record.coverage }
  ].filter((prop) => prop.value !== '');
  if (props.length > 0) {
    entry.props = props;
  }

  return entry;
}

function gapSummary(mappingId: string, side: string, ids: string[]): OscalGapSummary | undefined {
  if (ids.length === 0) {
    return undefined;
  }
  return {
    uuid: deterministicUuid(mappingId, `${side}-gap-summary`),
    'unmapped-controls': controlRefs(ids)
  };
}

export function buildMappingCollection(
  result: CrosswalkResult,
  resources: MappingResources,
  meta: DocumentMetadata
): OscalMappingCollectionDocument {
  const mappingId = `${meta.id}@${meta.version}`;
  const mapping: OscalMapping = {
    uuid: deterministicUuid('mapping', mappingId),
    'source-resource': { type: 'catalog', href: resources.sourceResource },
    'target-resource': { type: 'catalog', href: resources.targetResource },
    maps: result.mapped.map((record) => mapEntry(mappingId, record))
  };

  const sourceGaps = gapSummary(
    mappingId,
    'source',
    result.sourceGaps.map((record) => record.sourceId)
  );
  if (sourceGaps) {
    mapping['source-gap-summary'] = sourceGaps;
  }

  const targetGaps = gapSummary(
    mappingId,
    'target',
    result.targetGaps.flatMap((record) => record.targetIds)
  );
  if (targetGaps) {
    mapping['target-gap-summary'] = targetGaps;
  }

  return {
    'mapping-collection': {
      uuid: deterministicUuid('mapping-collection', mappingId),
      metadata: buildMetadata(meta),
      mappings: [mapping]
    }
  };
}
