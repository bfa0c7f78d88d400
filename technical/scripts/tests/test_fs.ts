import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import * as XLSX from 'xlsx';

export async function withTempCwd(
  prefix: string,
  run: (root: string) => Promise<void>
): Promise<void> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const realRoot = await fs.realpath(root);
  const originalCwd = process.cwd();

  try {
    process.chdir(realRoot);
    await run(realRoot);
  } finally {
    process.chdir(originalCwd);
    await fs.remove(realRoot);
  }
}

export async function writeFixtureFile(
  root: string,
  relativePath: string,
  content: string
): Promise<void> {
  const absolutePath = path.join(root, relativePath);
  await fs.ensureDir(path.dirname(absolutePath));
  const normalized = `${content.trim()}\n`;
  await fs.writeFile(absolutePath, normalized, 'utf8');
}

export async function writeJsonFixture(root: string, relativePath: string, data: unknown): Promise<void> {
  const absolutePath = path.join(root, relativePath);
  await fs.ensureDir(path.dirname(absolutePath));
  await fs.writeJson(absolutePath, data, { spaces: 2 });
}

export function buildWorkbook(sheets: Record<string, string[][]>): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return workbook;
}

export async function writeWorkbookFixture(
  root: string,
  relativePath: string,
  sheets: Record<string, string[][]>
): Promise<void> {
  const absolutePath = path.join(root, relativePath);
  await fs.ensureDir(path.dirname(absolutePath));
  const buffer: Buffer = XLSX.write(buildWorkbook(sheets), { type: 'buffer', bookType: 'xlsx' });
  await fs.writeFile(absolutePath, buffer);
}
