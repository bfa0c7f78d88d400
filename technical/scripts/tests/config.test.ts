import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';
import { fileURLToPath } from 'node:url';

import { loadPipelineConfig, parsePipelineConfig } from '../lib/config.js';
import { withTempCwd, writeJsonFixture } from './test_fs.js';

const TEST_DIR = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(TEST_DIR, '../../..');

const CATALOG = {
  id: 'csf',
  title: 'CSF',
  version: '2.0',
  input: 'library/sources/csf2.xlsx',
  sheet: 'CSF 2.0',
  columns: { function: 'Function', category: 'Category', subcategory: 'Subcategory' },
  output: 'technical/artifacts/catalogs/csf/catalog.json'
};

const CROSSWALK = {
  id: 'csf-to-r5',
  title: 'CSF to Rev 5',
  version: '1',
  input: 'library/sources/crosswalk.xlsx',
  sheet: 'Relationships',
  source_column: 'Focal',
  target_column: 'Reference',
  source_filter: '^[A-Z]{2}\\.[A-Z]{2}-\\d+$',
  source_notation: 'dotted-hierarchy',
  target_notation: 'dash-enhancement',
  source_resource: 'catalogs/csf/catalog.json',
  target_resource: 'catalogs/r5/catalog.json',
  target_catalog: 'library/catalogs/r5/catalog.json',
  default_relationship: 'superset-of',
  output: 'technical/artifacts/mappings/csf-to-r5.csv'
};

test('parsePipelineConfig fills defaults for optional fields', () => {
  const config = parsePipelineConfig({ catalogs: [CATALOG], crosswalks: [CROSSWALK] }, 'cfg');

  assert.equal(config.catalogs[0].skipRows, 0);
  assert.equal(config.catalogs[0].groupIdStyle, 'abbreviation');
  assert.equal(config.catalogs[0].columns.examples, undefined);

  const [crosswalk] = config.crosswalks;
  assert.equal(crosswalk.confidence, '100%');
  assert.equal(crosswalk.coverage, '');
  assert.equal(crosswalk.includeTargetGaps, false);
  assert.equal(crosswalk.skipAfterHeader, 0);
  assert.equal(crosswalk.classification, undefined);
  assert.equal(crosswalk.sourceFilter?.test('GV.OC-01'), true);
  assert.equal(crosswalk.sourceFilter?.test('GV.OC'), false);
});

test('parsePipelineConfig reads classification phrases from snake_case keys', () => {
  const config = parsePipelineConfig(
    {
      crosswalks: [
        {
          ...CROSSWALK,
          classification: {
            changed_elements_column: 'changed_elements',
            change_details_column: 'change_details',
            phrases: {
              lifecycle: { withdrawn_in_source: 'withdrawn in rev4' },
              no_change_marker: 'none',
              neutral: ['changes reference']
            }
          }
        }
      ]
    },
    'cfg'
  );

  assert.deepEqual(config.catalogs, []);
  assert.deepEqual(config.crosswalks[0].classification, {
    changedElementsColumn: 'changed_elements',
    changeDetailsColumn: 'change_details',
    phrases: {
      noChangeMarker: 'none',
      newControl: undefined,
      neutral: ['changes reference'],
      adds: undefined,
      removes: undefined,
      changesControl: undefined,
      lifecycle: {
        withdrawnInSource: 'withdrawn in rev4',
        previouslyWithdrawnInSource: undefined,
        restoredInTarget: undefined,
        withdrawnMarker: undefined
      }
    }
  });
});

test('parsePipelineConfig names the offending field', () => {
  assert.throws(
    () => parsePipelineConfig({ catalogs: [{ ...CATALOG, sheet: '' }] }, 'cfg'),
    { message: 'cfg: catalogs[0].sheet must be a non-empty string' }
  );
  assert.throws(
    () => parsePipelineConfig({ crosswalks: [{ ...CROSSWALK, source_notation: 'dotted' }] }, 'cfg'),
    {
      message:
        "cfg: crosswalks[0].source_notation has unknown notation 'dotted'. Expected dotted-hierarchy|dash-enhancement|triple-segment"
    }
  );
  assert.throws(
    () => parsePipelineConfig({ crosswalks: [{ ...CROSSWALK, default_relationship: 'same' }] }, 'cfg'),
    { message: "cfg: crosswalks[0].default_relationship has unknown relationship 'same'" }
  );
  assert.throws(
    () => parsePipelineConfig({ catalogs: [{ ...CATALOG, skip_rows: -1 }] }, 'cfg'),
    { message: 'cfg: catalogs[0].skip_rows must be a non-negative integer' }
  );
  assert.throws(() => parsePipelineConfig({ catalogs: [CATALOG, CATALOG] }, 'cfg'), {
    message: "cfg: catalogs has duplicate id 'csf'"
  });
  assert.throws(() => parsePipelineConfig([], 'cfg'), { message: 'cfg must be an object' });
});

test('loadPipelineConfig reads library/config/frameworks.json from the working directory', async () => {
  await withTempCwd('pipeline-config-', async (root) => {
    await assert.rejects(loadPipelineConfig(), {
      message: 'Pipeline configuration not found: library/config/frameworks.json'
    });

    await writeJsonFixture(root, 'library/config/frameworks.json', { catalogs: [CATALOG] });
    const config = await loadPipelineConfig();
    assert.deepEqual(
      config.catalogs.map((entry) => entry.id),
      ['csf']
    );
  });
});

test('the shipped frameworks configuration is valid', async () => {
  const data: unknown = await fs.readJson(path.join(REPO_ROOT, 'library/config/frameworks.json'));
  const config = parsePipelineConfig(data, 'frameworks.json');

  assert.deepEqual(
    config.catalogs.map((entry) => entry.id),
    ['nist-csf-2.0']
  );
  assert.deepEqual(
    config.crosswalks.map((entry) => [entry.id, entry.sourceNotation, entry.targetNotation]),
    [
      ['csf2-to-sp800-53r5', 'dotted-hierarchy', 'dash-enhancement'],
      ['sp800-53r5-to-r4', 'dash-enhancement', 'triple-segment']
    ]
  );
});
