import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export interface RunOptions {
  check: boolean;
  only?: string;
}

export function getRunOptions(argv: string[]): RunOptions {
  const options: RunOptions = { check: false };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === '--check') {
      options.check = true;
      continue;
    }

    if (token === '--only') {
      const value = argv[index + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for option '--only'`);
      }
      options.only = value.trim();
      index += 1;
      continue;
    }

    throw new Error(`Unexpected argument '${token}'. Expected --check or --only <id>`);
  }

  return options;
}

export function selectEntries<T extends { id: string }>(entries: T[], options: RunOptions): T[] {
  if (!options.only) {
    return entries;
  }

  const selected = entries.filter((entry) => entry.id === options.only);
  if (selected.length === 0) {
    throw new Error(
      `No configured entry '${options.only}'. Expected one of: ${entries.map((entry) => entry.id).join(', ')}`
    );
  }
  return selected;
}

export function repoPath(...parts: string[]): string {
  return path.join(process.cwd(), ...parts);
}

export function toPosixRelative(filePath: string): string {
  return path.relative(process.cwd(), filePath).split(path.sep).join('/');
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

export async function requireInputFile(filePath: string, label: string): Promise<void> {
  if (!(await fs.pathExists(filePath))) {
    throw new Error(`${label} not found: ${toPosixRelative(filePath)}`);
  }
}

export function stableJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function stableText(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export interface WriteResult {
  changed: boolean;
  wrote: boolean;
}

async function writeIfChanged(
  filePath: string,
  next: string,
  options: Pick<RunOptions, 'check'>
): Promise<WriteResult> {
  let current: string | null = null;

  if (await fs.pathExists(filePath)) {
    current = await fs.readFile(filePath, 'utf8');
  }

  if (current === next) {
    return { changed: false, wrote: false };
  }

  if (options.check) {
    return { changed: true, wrote: false };
  }

  await ensureParentDir(filePath);
  await fs.writeFile(filePath, next, 'utf8');
  return { changed: true, wrote: true };
}

export async function writeJsonFile(
  filePath: string,
  data: unknown,
  options: Pick<RunOptions, 'check'>
): Promise<WriteResult> {
  return writeIfChanged(filePath, stableJson(data), options);
}

export async function writeTextFile(
  filePath: string,
  content: string,
  options: Pick<RunOptions, 'check'>
): Promise<WriteResult> {
  return writeIfChanged(filePath, stableText(content), options);
}

export function logWriteResult(check: boolean, filePath: string, result: WriteResult, detail = ''): void {
  const suffix = detail ? ` (${detail})` : '';
  if (!result.changed) {
    console.log(`No changes ${toPosixRelative(filePath)}${suffix}`);
    return;
  }
  const status = check ? 'Would update' : 'Updated';
  console.log(`${status} ${toPosixRelative(filePath)}${suffix}`);
}

export async function listArtifactFiles(
  rootDir: string,
  patterns: string[] = ['**/*.json', '**/*.csv', '**/*.md']
): Promise<string[]> {
  if (!(await fs.pathExists(rootDir))) {
    return [];
  }

  const files = await fg(patterns, {
    cwd: rootDir,
    dot: false,
    onlyFiles: true
  });

  return files.sort();
}
