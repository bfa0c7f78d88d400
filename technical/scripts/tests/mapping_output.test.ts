import assert from 'node:assert/strict';
import test from 'node:test';

import type { CrosswalkResult } from '../lib/crosswalk_builder.js';
import { formatCsv, formatMappingCsv, toMappingTable } from '../lib/mapping_output.js';

const RESOURCES = {
  sourceResource: 'catalogs/NIST_CSF_v2.0/catalog.json',
  targetResource: 'catalogs/NIST_SP-800-53_rev5/catalog.json'
};

const RESULT: CrosswalkResult = {
  mapped: [
    {
      sourceId: 'gv.oc-01',
      targetIds: ['ac-1', 'ac-2.1'],
      relationship: 'superset-of',
      confidence: '100%',
      coverage: ''
    }
  ],
  sourceGaps: [{ sourceId: 'gv.oc-03', targetIds: [], relationship: '', confidence: '', coverage: '' }],
  targetGaps: [{ sourceId: '', targetIds: ['ac-2'], relationship: '', confidence: '', coverage: '' }],
  unmatchedTargetIds: [],
  excluded: [],
  reviewRequired: [],
  unmappedSourceCount: 1
};

test('toMappingTable starts with the column names and their descriptions', () => {
  const table = toMappingTable(RESULT, RESOURCES);

  assert.deepEqual(table[0], [
    '$$Source_Resource',
    '$$Target_Resource',
    '$$Map_Source_ID_Ref_list',
    '$$Map_Target_ID_Ref_list',
    '$$Map_Relationship',
    '$Map_Confidence_Score',
    '$Map_Coverage'
  ]);
  assert.equal(table[1][2], 'A list of source reference IDs.');
  assert.equal(table.length, 5);
});

test('formatMappingCsv writes mapped rows before source and target gaps', () => {
  const lines = formatMappingCsv(RESULT, RESOURCES).split('\n');

  assert.deepEqual(lines.slice(2), [
    'catalogs/NIST_CSF_v2.0/catalog.json,catalogs/NIST_SP-800-53_rev5/catalog.json,gv.oc-01,ac-1 ac-2.1,superset-of,100%,',
    'catalogs/NIST_CSF_v2.0/catalog.json,catalogs/NIST_SP-800-53_rev5/catalog.json,gv.oc-03,,,,',
    'catalogs/NIST_CSF_v2.0/catalog.json,catalogs/NIST_SP-800-53_rev5/catalog.json,,ac-2,,,'
  ]);
});

test('formatCsv quotes cells that contain separators or quotes', () => {
  assert.equal(formatCsv([['a,b', 'say "hi"', 'plain']]), '"a,b","say ""hi""",plain');
});
