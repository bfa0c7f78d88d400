import assert from 'node:assert/strict';
import test from 'node:test';

import { buildCrosswalk, type CrosswalkOptions } from '../lib/crosswalk_builder.js';

const CSF_OPTIONS: CrosswalkOptions = {
  sourceNotation: 'dotted-hierarchy',
  targetNotation: 'dash-enhancement',
  targetCatalogIds: new Set(['ac', 'ac-1', 'ac-2', 'ac-2.1']),
  sourceCatalogIds: new Set(['gv', 'gv.oc', 'gv.oc-01', 'gv.oc-02', 'gv.oc-03', 'gv.oc-04']),
  defaultRelationship: 'superset-of',
  confidence: '100%'
};

const CSF_ROWS = [
  { source: 'GV.OC-01', target: 'AC-01' },
  { source: 'GV.OC-01', target: 'AC-2(1)' },
  { source: 'GV.OC-01', target: 'AC-01,' },
  { source: 'GV.OC-02', target: 'ZZ-9' },
  { source: '', target: 'AC-01' },
  { source: 'GV.OC-03', target: '' }
];

test('buildCrosswalk groups targets per source in first-seen order without duplicates', () => {
  const result = buildCrosswalk(CSF_ROWS, CSF_OPTIONS);

  assert.deepEqual(result.mapped, [
    {
      sourceId: 'gv.oc-01',
      targetIds: ['ac-1', 'ac-2.1'],
      relationship: 'superset-of',
      confidence: '100%',
      coverage: ''
    },
    {
      sourceId: 'gv.oc-02',
      targetIds: ['zz-9'],
      relationship: 'superset-of',
      confidence: '100%',
      coverage: ''
    }
  ]);
  assert.deepEqual(result.unmatchedTargetIds, ['zz-9']);
});

test('every leaf source control is either mapped or a source gap', () => {
  const result = buildCrosswalk(CSF_ROWS, CSF_OPTIONS);

  assert.deepEqual(result.sourceGaps, [
    { sourceId: 'gv.oc-03', targetIds: [], relationship: '', confidence: '', coverage: '' },
    { sourceId: 'gv.oc-04', targetIds: [], relationship: '', confidence: '', coverage: '' }
  ]);
  assert.equal(result.unmappedSourceCount, 2);
  assert.deepEqual(result.targetGaps, []);
});

test('target gaps list unreferenced leaf target controls when requested', () => {
  const result = buildCrosswalk(CSF_ROWS, { ...CSF_OPTIONS, includeTargetGaps: true });

  assert.deepEqual(result.targetGaps, [
    { sourceId: '', targetIds: ['ac-2'], relationship: '', confidence: '', coverage: '' }
  ]);
});

test('classified rows route new and restored controls to gaps and drop withdrawn ones', () => {
  const result = buildCrosswalk(
    [
      { source: 'AC-1', target: 'AC-01-00', relationship: 'equal-to' },
      { source: 'AC-2(1)', target: 'AC-02-01', relationship: 'superset-of' },
      { source: 'AC-2(13)', target: '', relationship: 'no-relationship' },
      { source: 'AC-2(14)', target: 'AC-02-14', relationship: 'restored-in-target' },
      { source: 'AC-13', target: 'AC-13-00', relationship: 'withdrawn' },
      { source: 'AC-16(1)', target: '', relationship: 'withdrawn-error' }
    ],
    {
      sourceNotation: 'dash-enhancement',
      targetNotation: 'triple-segment',
      targetCatalogIds: new Set(['ac-1', 'ac-2.1']),
      defaultRelationship: 'equal-to',
      confidence: '100%'
    }
  );

  assert.deepEqual(
    result.mapped.map((record) => [record.sourceId, record.targetIds, record.relationship]),
    [
      ['ac-1', ['ac-1'], 'equal-to'],
      ['ac-2.1', ['ac-2.1'], 'superset-of']
    ]
  );
  assert.deepEqual(
    result.sourceGaps.map((record) => record.sourceId),
    ['ac-2.13', 'ac-2.14']
  );
  assert.deepEqual(result.excluded, [
    { sourceId: 'ac-13', relationship: 'withdrawn' },
    { sourceId: 'ac-16.1', relationship: 'withdrawn-error' }
  ]);
  assert.deepEqual(result.reviewRequired, [{ sourceId: 'ac-16.1', relationship: 'withdrawn-error' }]);
  assert.deepEqual(result.unmatchedTargetIds, []);
});

test('the first classification seen for a source decides its relationship', () => {
  const result = buildCrosswalk(
    [
      { source: 'AC-2', target: 'AC-02-00', relationship: 'subset-of' },
      { source: 'AC-2', target: 'AC-02-01', relationship: 'superset-of' },
      { source: 'AC-3', target: 'AC-03-00' }
    ],
    {
      sourceNotation: 'dash-enhancement',
      targetNotation: 'triple-segment',
      targetCatalogIds: new Set(['ac-2', 'ac-2.1', 'ac-3']),
      defaultRelationship: 'equal-to',
      confidence: '90%',
      coverage: '50%'
    }
  );

  assert.deepEqual(result.mapped, [
    {
      sourceId: 'ac-2',
      targetIds: ['ac-2', 'ac-2.1'],
      relationship: 'subset-of',
      confidence: '90%',
      coverage: '50%'
    },
    {
      sourceId: 'ac-3',
      targetIds: ['ac-3'],
      relationship: 'equal-to',
      confidence: '90%',
      coverage: '50%'
    }
  ]);
});

test('a source that is mapped by another row is never a gap', () => {
  const result = buildCrosswalk(
    [
      { source: 'AC-4', target: '', relationship: 'no-relationship' },
      { source: 'AC-4', target: 'AC-04-00', relationship: 'equal-to' }
    ],
    {
      sourceNotation: 'dash-enhancement',
      targetNotation: 'triple-segment',
      targetCatalogIds: new Set(['ac-4']),
      sourceCatalogIds: new Set(['ac-4']),
      defaultRelationship: 'equal-to',
      confidence: '100%'
    }
  );

  assert.deepEqual(result.sourceGaps, []);
  assert.equal(result.mapped.length, 1);
});

test('withdrawn sources listed in the source catalog are excluded, not gaps', () => {
  const result = buildCrosswalk(
    [
      { source: 'AC-1', target: 'AC-01-00', relationship: 'equal-to' },
      { source: 'AC-13', target: 'AC-13-00', relationship: 'withdrawn-in-target-only' },
      { source: 'AC-16(1)', target: '', relationship: 'withdrawn-error' }
    ],
    {
      sourceNotation: 'dash-enhancement',
      targetNotation: 'triple-segment',
      targetCatalogIds: new Set(['ac-1', 'ac-13']),
      sourceCatalogIds: new Set(['ac', 'ac-1', 'ac-13', 'ac-16.1', 'ac-17']),
      defaultRelationship: 'equal-to',
      confidence: '100%'
    }
  );

  assert.deepEqual(result.excluded, [
    { sourceId: 'ac-13', relationship: 'withdrawn-in-target-only' },
    { sourceId: 'ac-16.1', relationship: 'withdrawn-error' }
  ]);
  assert.deepEqual(
    result.sourceGaps.map((record) => record.sourceId),
    ['ac-17']
  );
  assert.equal(result.unmappedSourceCount, 1);
});
