import fs from 'fs-extra';

import { listFiles, repoPath, toPosixRelative } from './io.js';
import type { AdministrativeRecord } from './parsed_address.js';

export const GAZETTEER_HEADER = 'id,province,city,district';

export interface GazetteerRow {
  filePath: string;
  line: number;
  columns: number;
  province: string;
  city: string;
  district: string;
}

export function defaultGazetteerDir(): string {
  return repoPath('library', 'gazetteer');
}

export async function listGazetteerFiles(rootDir: string): Promise<string[]> {
  return listFiles(rootDir, '**/*.csv');
}

/** Describes what is wrong with the first line, without naming the file. */
export function gazetteerHeaderProblem(content: string): string | undefined {
  const header = content.replace(/^\uFEFF/, '').split(/\r?\n/, 1)[0].trim();
  return header === GAZETTEER_HEADER
    ? undefined
    : `must start with header '${GAZETTEER_HEADER}'. Found: '${header}'`;
}

export function assertGazetteerHeader(content: string, filePath: string): void {
  const problem = gazetteerHeaderProblem(content);
  if (problem) {
    throw new Error(`${toPosixRelative(filePath)} ${problem}`);
  }
}

export function readGazetteerRows(content: string, filePath: string): GazetteerRow[] {
  assertGazetteerHeader(content, filePath);

  const rows: GazetteerRow[] = [];
  const lines = content.split(/\r?\n/);

  for (let index = 1; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (line.length === 0) {
      continue;
    }

    const parts = line.split(',').map((part) => part.trim());
    rows.push({
      filePath,
      line: index + 1,
      columns: parts.length,
      province: parts[1] ?? '',
      city: parts[2] ?? '',
      district: parts[3] ?? ''
    });
  }

  return rows;
}

export function rowToRecord(row: GazetteerRow): AdministrativeRecord | null {
  if (row.columns < 3 || !row.province || !row.city) {
    return null;
  }

  return row.district
    ? { province: row.province, city: row.city, district: row.district }
    : { province: row.province, city: row.city };
}

export function parseGazetteerCsv(content: string, filePath: string): AdministrativeRecord[] {
  return readGazetteerRows(content, filePath)
    .map((row) => rowToRecord(row))
    .filter((record): record is AdministrativeRecord => record !== null);
}

export function dedupeRecords(records: Iterable<AdministrativeRecord>): AdministrativeRecord[] {
  const seen = new Set<string>();
  const unique: AdministrativeRecord[] = [];

  for (const record of records) {
    const key = `${record.province}\u0000${record.city}\u0000${record.district ?? ''}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(record);
  }

  return unique;
}

export async function loadGazetteer(
  rootDir: string = defaultGazetteerDir()
): Promise<AdministrativeRecord[]> {
  if (!(await fs.pathExists(rootDir))) {
    throw new Error(`Gazetteer directory not found: ${toPosixRelative(rootDir)}`);
  }

  const files = await listGazetteerFiles(rootDir);
  if (files.length === 0) {
    throw new Error(`No gazetteer CSV files found in ${toPosixRelative(rootDir)}`);
  }

  const records: AdministrativeRecord[] = [];
  for (const file of files) {
    const content = await fs.readFile(file, 'utf8');
    records.push(...parseGazetteerCsv(content, file));
  }

  const unique = dedupeRecords(records);
  if (unique.length === 0) {
    throw new Error(`Gazetteer in ${toPosixRelative(rootDir)} has no usable records`);
  }

  return unique;
}
