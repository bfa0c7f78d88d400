import * as XLSX from 'xlsx';

import type { CrosswalkResult, MappingRecord } from './crosswalk_builder.js';
import type { MappingResources } from './oscal.js';

export const MAPPING_COLUMNS = [
  {
    name: '$$Source_Resource',
    description: 'A reference to a resource that has the source controls of a mapping.'
  },
  {
    name: '$$Target_Resource',
    description: 'A reference to a resource that has the target controls of a mapping.'
  },
  {
    name: '$$Map_Source_ID_Ref_list',
    description: 'A list of source reference IDs.'
  },
  {
    name: '$$Map_Target_ID_Ref_list',
    description: 'A list of target reference IDs.'
  },
  {
    name: '$$Map_Relationship',
    description: 'The relationship type for the mapping entry.'
  },
  {
    name: '$Map_Confidence_Score',
    description:
      'An estimation of the confidence that this mapping is correct and accurate expressed as percentage.'
  },
  {
    name: '$Map_Coverage',
    description: 'An estimation of the percentage coverage of the targets by the sources.'
  }
] as const;

export function toMappingRow(record: MappingRecord, resources: MappingResources): string[] {
  return [
    resources.sourceResource,
    resources.targetResource,
    record.sourceId,
    record.targetIds.join(' '),
    record.relationship,
    record.confidence,
    record.coverage
  ];
}

/**
 * Header row, column-description row, then mapped records followed by
 * source gaps and target gaps.
 */
export function toMappingTable(result: CrosswalkResult, resources: MappingResources): string[][] {
  const records = [...result.mapped, ...result.sourceGaps, ...result.targetGaps];
  return [
    MAPPING_COLUMNS.map((column) => column.name),
    MAPPING_COLUMNS.map((column) => column.description),
    ...records.map((record) => toMappingRow(record, resources))
  ];
}

export function formatCsv(table: string[][]): string {
  const sheet = XLSX.utils.aoa_to_sheet(table);
  return XLSX.utils.sheet_to_csv(sheet, { blankrows: true });
}

export function formatMappingCsv(result: CrosswalkResult, resources: MappingResources): string {
  return formatCsv(toMappingTable(result, resources));
}
