import type { CrosswalkResult } from './crosswalk_builder.js';
import {
  RELATIONSHIP_KINDS,
  countRelationships,
  type ClassifiedComparisonRow,
  type RelationshipKind
} from './relationship_classifier.js';

export const RELATIONSHIP_DEFINITIONS: Record<RelationshipKind, string> = {
  'equal-to': 'No changes at all between the two revisions',
  'equivalent-to': 'Cosmetic or discussion-only changes; same substance',
  'superset-of': 'The source added requirements (source ⊃ target)',
  'subset-of': 'The source removed requirements (source ⊂ target)',
  'intersects-with': 'Overlapping changes in both directions',
  'no-relationship': 'New source control; no target counterpart',
  withdrawn: 'Withdrawn in both revisions',
  'withdrawn-in-source-only': 'Previously withdrawn in the prior revision only',
  'restored-in-target': 'Withdrawn in the prior revision, restored in the current one',
  'withdrawn-in-target-only': 'Active in the prior revision, withdrawn in the current one',
  'withdrawn-error': 'Unexpected withdrawal combination; needs manual review'
};

export interface CrosswalkStats {
  mapped: number;
  sourceGaps: number;
  newControls: number;
  restoredControls: number;
  excluded: number;
  targetGaps: number;
  totalRows: number;
}

export function crosswalkStats(
  rows: readonly ClassifiedComparisonRow[],
  result: CrosswalkResult
): CrosswalkStats {
  const counts = countRelationships(rows.map((row) => row.relationship));
  return {
    mapped: result.mapped.length,
    sourceGaps: result.sourceGaps.length,
    newControls: counts['no-relationship'],
    restoredControls: counts['restored-in-target'],
    excluded: result.excluded.length,
    targetGaps: result.targetGaps.length,
    totalRows: result.mapped.length + result.sourceGaps.length + result.targetGaps.length
  };
}

function percentage(count: number, total: number): string {
  const pct = total > 0 ? (count / total) * 100 : 0;
  return `${pct.toFixed(1)}%`;
}

export function buildRelationshipSummary(
  title: string,
  rows: readonly ClassifiedComparisonRow[],
  stats?: CrosswalkStats
): string {
  const counts = countRelationships(rows.map((row) => row.relationship));
  const total = rows.length;

  const lines = [
    `# ${title}`,
    '',
    '## Overview',
    '',
    `Total controls analyzed: **${total}**`,
    '',
    '## Relationship Distribution',
    '',
    '| Relationship | Count | Percentage |',
    '|--------------|-------|------------|'
  ];

  for (const kind of RELATIONSHIP_KINDS) {
    if (counts[kind] === 0) {
      continue;
    }
    lines.push(`| ${kind} | ${counts[kind]} | ${percentage(counts[kind], total)} |`);
  }

  if (stats) {
    lines.push(
      '',
      '## Mapping Statistics',
      '',
      `- **Mapped controls**: ${stats.mapped}`,
      `- **Source gaps**: ${stats.sourceGaps}`,
      `  - New controls (no-relationship): ${stats.newControls}`,
      `  - Restored controls (restored-in-target): ${stats.restoredControls}`,
      `- **Target gaps**: ${stats.targetGaps}`,
      `- **Excluded**: ${stats.excluded} (withdrawn rows left out of the mapping)`,
      `- **Total mapping rows**: ${stats.totalRows}`
    );
  }

  lines.push('', '## Relationship Definitions', '');
  for (const kind of RELATIONSHIP_KINDS) {
    lines.push(`- **${kind}**: ${RELATIONSHIP_DEFINITIONS[kind]}`);
  }

  const review = rows.filter((row) => row.relationship === 'withdrawn-error');
  if (review.length > 0) {
    lines.push('', '## Requires Manual Review', '');
    for (const row of review) {
      lines.push(`- ${row.identifier}: ${row.changeDetails.replace(/\s+/g, ' ').trim()}`);
    }
  }

  return lines.join('\n');
}
