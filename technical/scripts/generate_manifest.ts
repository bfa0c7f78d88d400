import fs from 'fs-extra';

import { loadPipelineConfig } from './lib/config.js';
import {
  getRunOptions,
  listArtifactFiles,
  logWriteResult,
  repoPath,
  writeJsonFile
} from './lib/io.js';

const ARTIFACTS_DIR = ['technical', 'artifacts'];
const MANIFEST_FILE = 'manifest.json';

async function resolveGeneratedAt(files: string[]): Promise<string> {
  if (files.length === 0) {
    return new Date(0).toISOString();
  }

  const stats = await Promise.all(files.map(async (file) => fs.stat(repoPath(...ARTIFACTS_DIR, file))));
  const latest = stats.reduce((acc, stat) => Math.max(acc, stat.mtimeMs), 0);
  return new Date(latest).toISOString();
}

function groupByDirectory(files: string[]): Record<string, string[]> {
  const groups: Record<string, string[]> = {};
  for (const file of files) {
    const slash = file.indexOf('/');
    const key = slash === -1 ? '.' : file.slice(0, slash);
    (groups[key] ??= []).push(file);
  }
  return groups;
}

async function main(): Promise<void> {
  const options = getRunOptions(process.argv.slice(2));
  const config = await loadPipelineConfig();
  const artifactsDir = repoPath(...ARTIFACTS_DIR);

  const files = (await listArtifactFiles(artifactsDir)).filter((file) => file !== MANIFEST_FILE);
  const manifest = {
    generator: 'control-crosswalk-kb',
    version: '1.0.0',
    generated_at: await resolveGeneratedAt(files),
    catalogs: config.catalogs.map((entry) => ({ id: entry.id, version: entry.version, output: entry.output })),
    crosswalks: config.crosswalks.map((entry) => ({ id: entry.id, version: entry.version, output: entry.output })),
    file_count: files.length,
    files: groupByDirectory(files)
  };

  const outFile = repoPath(...ARTIFACTS_DIR, MANIFEST_FILE);
  const result = await writeJsonFile(outFile, manifest, { check: options.check });
  logWriteResult(options.check, outFile, result, `${files.length} file(s)`);

  if (options.check) {
    if (result.changed) {
      process.exit(1);
    }
    console.log('generate_manifest.ts check passed.');
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
