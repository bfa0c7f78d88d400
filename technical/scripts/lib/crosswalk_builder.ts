import { canonicalize, isLeafControlId, type NotationKind } from './control_identifier.js';
import type { RelationshipKind } from './relationship_classifier.js';

export interface CrosswalkInputRow {
  source: string;
  target: string;
  relationship?: RelationshipKind;
}

export interface CrosswalkOptions {
  sourceNotation: NotationKind;
  targetNotation: NotationKind;
  targetCatalogIds: ReadonlySet<string>;
  sourceCatalogIds?: ReadonlySet<string>;
  defaultRelationship: RelationshipKind;
  confidence: string;
  coverage?: string;
  includeTargetGaps?: boolean;
}

export interface MappingRecord {
  sourceId: string;
  targetIds: string[];
  relationship: RelationshipKind | '';
  confidence: string;
  coverage: string;
}

export interface ExcludedSource {
  sourceId: string;
  relationship: RelationshipKind;
}

export interface CrosswalkResult {
  mapped: MappingRecord[];
  sourceGaps: MappingRecord[];
  targetGaps: MappingRecord[];
  unmatchedTargetIds: string[];
  excluded: ExcludedSource[];
  reviewRequired: ExcludedSource[];
  unmappedSourceCount: number;
}

// A source with no counterpart on the target side.
const SOURCE_GAP_KINDS: ReadonlySet<RelationshipKind> = new Set([
  'no-relationship',
  'restored-in-target'
]);

const EXCLUDED_KINDS: ReadonlySet<RelationshipKind> = new Set([
  'withdrawn',
  'withdrawn-in-source-only',
  'withdrawn-in-target-only',
  'withdrawn-error'
]);

interface MappingGroup {
  targetIds: string[];
  relationship?: RelationshipKind;
}

function gapRecord(sourceId: string, targetIds: string[] = []): MappingRecord {
  return { sourceId, targetIds, relationship: '', confidence: '', coverage: '' };
}

function sortIds(ids: Iterable<string>): string[] {
  return Array.from(ids).sort((a, b) => a.localeCompare(b));
}

/**
 * Collapses raw source/target rows into one mapping record per canonical
 * source id and partitions the controls that have no counterpart into
 * source and target gaps.
 *
 * Rows classified as new or restored become source gaps, withdrawn rows are
 * left out of the mapping entirely, and `withdrawn-error` rows are also
 * returned in `reviewRequired`. Target ids missing from the target catalog
 * stay in the mapping and are listed in `unmatchedTargetIds`.
 */
export function buildCrosswalk(
  rows: readonly CrosswalkInputRow[],
  options: CrosswalkOptions
): CrosswalkResult {
  const groups = new Map<string, MappingGroup>();
  const gapCandidates: string[] = [];
  const excluded: ExcludedSource[] = [];

  for (const row of rows) {
    const sourceId = canonicalize(row.source, options.sourceNotation);
    if (!sourceId) {
      continue;
    }

    if (row.relationship && SOURCE_GAP_KINDS.has(row.relationship)) {
      gapCandidates.push(sourceId);
      continue;
    }

    if (row.relationship && EXCLUDED_KINDS.has(row.relationship)) {
      excluded.push({ sourceId, relationship: row.relationship });
      continue;
    }

    const targetId = canonicalize(row.target, options.targetNotation);
    if (!targetId) {
      continue;
    }

    let group = groups.get(sourceId);
    if (!group) {
      group = { targetIds: [] };
      groups.set(sourceId, group);
    }
    if (!group.targetIds.includes(targetId)) {
      group.targetIds.push(targetId);
    }
    if (group.relationship === undefined && row.relationship !== undefined) {
      group.relationship = row.relationship;
    }
  }

  const mapped: MappingRecord[] = Array.from(groups.entries(), ([sourceId, group]) => ({
    sourceId,
    targetIds: group.targetIds,
    relationship: group.relationship ?? options.defaultRelationship,
    confidence: options.confidence,
    coverage: options.coverage ?? ''
  }));

  const referencedTargets = new Set(mapped.flatMap((record) => record.targetIds));
  const unmatchedTargetIds = sortIds(
    Array.from(referencedTargets).filter((id) => !options.targetCatalogIds.has(id))
  );

  const gapIds: string[] = [];
  const seenGaps = new Set<string>();
  const excludedIds = new Set(excluded.map((entry) => entry.sourceId));
  const addGap = (sourceId: string): void => {
    if (groups.has(sourceId) || excludedIds.has(sourceId) || seenGaps.has(sourceId)) {
      return;
    }
    seenGaps.add(sourceId);
    gapIds.push(sourceId);
  };

  gapCandidates.forEach(addGap);
  if (options.sourceCatalogIds) {
    sortIds(Array.from(options.sourceCatalogIds).filter(isLeafControlId)).forEach(addGap);
  }

  const targetGaps = options.includeTargetGaps
    ? sortIds(
        Array.from(options.targetCatalogIds).filter(
          (id) => isLeafControlId(id) && !referencedTargets.has(id)
        )
      ).map((targetId) => gapRecord('', [targetId]))
    : [];

  const sourceGaps = gapIds.map((sourceId) => gapRecord(sourceId));

  return {
    mapped,
    sourceGaps,
    targetGaps,
    unmatchedTargetIds,
    excluded,
    reviewRequired: excluded.filter((entry) => entry.relationship === 'withdrawn-error'),
    unmappedSourceCount: sourceGaps.length
  };
}
