import fs from 'fs-extra';

import { MUNICIPALITIES, NO_DISTRICT_CITIES } from './administrative_index.js';
import {
  gazetteerHeaderProblem,
  listGazetteerFiles,
  readGazetteerRows,
  type GazetteerRow
} from './gazetteer.js';
import { toPosixRelative } from './io.js';
import { PROVINCE_ALIASES } from './province_aliases.js';

const MUNICIPALITY_SET: ReadonlySet<string> = new Set(MUNICIPALITIES);
const NO_DISTRICT_CITY_SET: ReadonlySet<string> = new Set(NO_DISTRICT_CITIES);

export class ValidationContext {
  errors: string[] = [];
  warnings: string[] = [];

  addError(filePath: string, message: string): void {
    this.errors.push(`ERROR [${toPosixRelative(filePath)}]: ${message}`);
  }

  addWarning(filePath: string, message: string): void {
    this.warnings.push(`WARN [${toPosixRelative(filePath)}]: ${message}`);
  }
}

function rowKey(row: GazetteerRow): string {
  return `${row.province}\u0000${row.city}\u0000${row.district}`;
}

function where(row: GazetteerRow): string {
  return `line ${row.line}`;
}

function validateRowShape(ctx: ValidationContext, row: GazetteerRow): boolean {
  if (row.columns < 3 || row.columns > 4) {
    ctx.addError(row.filePath, `${where(row)} has ${row.columns} column(s); expected 3 or 4`);
    return false;
  }
  if (!row.province) {
    ctx.addError(row.filePath, `${where(row)} has an empty province`);
    return false;
  }
  if (!row.city) {
    ctx.addError(row.filePath, `${where(row)} has an empty city`);
    return false;
  }
  return true;
}

export function validateGazetteerRows(ctx: ValidationContext, rows: GazetteerRow[]): void {
  const seenRows = new Map<string, GazetteerRow>();
  const cityProvince = new Map<string, GazetteerRow>();
  const cityWithoutDistrict = new Map<string, GazetteerRow>();
  const cityWithDistrict = new Map<string, GazetteerRow>();
  const provinces = new Map<string, GazetteerRow>();

  for (const row of rows) {
    if (!validateRowShape(ctx, row)) {
      continue;
    }

    const key = rowKey(row);
    const duplicate = seenRows.get(key);
    if (duplicate) {
      ctx.addError(
        row.filePath,
        `${where(row)} duplicates ${toPosixRelative(duplicate.filePath)} ${where(duplicate)}`
      );
      continue;
    }
    seenRows.set(key, row);

    if (!provinces.has(row.province)) {
      provinces.set(row.province, row);
    }

    const owner = cityProvince.get(row.city);
    if (!owner) {
      cityProvince.set(row.city, row);
    } else if (owner.province !== row.province) {
      ctx.addError(
        row.filePath,
        `${where(row)} registers ${row.city} under ${row.province}; already under ${owner.province}`
      );
    }

    if (MUNICIPALITY_SET.has(row.province) && row.city !== row.province) {
      ctx.addError(
        row.filePath,
        `${where(row)} municipality ${row.province} must use itself as city, found ${row.city}`
      );
    }

    if (row.district) {
      if (!cityWithDistrict.has(row.city)) {
        cityWithDistrict.set(row.city, row);
      }
    } else if (!cityWithoutDistrict.has(row.city)) {
      cityWithoutDistrict.set(row.city, row);
    }
  }

  for (const [city, row] of cityWithoutDistrict) {
    if (cityWithDistrict.has(city)) {
      ctx.addError(row.filePath, `${where(row)} lists ${city} without a district, but it has districts`);
    } else if (!NO_DISTRICT_CITY_SET.has(city)) {
      ctx.addWarning(row.filePath, `${where(row)} ${city} has no districts and is not a known unit-less city`);
    }
  }

  const aliased = new Set(PROVINCE_ALIASES.values());
  for (const [province, row] of provinces) {
    if (!aliased.has(province)) {
      ctx.addWarning(row.filePath, `${province} has no short alias and only matches by its full name`);
    }
  }
}

export async function validateGazetteer(rootDir: string): Promise<ValidationContext> {
  const ctx = new ValidationContext();
  const files = await listGazetteerFiles(rootDir);

  if (files.length === 0) {
    ctx.addError(rootDir, 'At least one gazetteer CSV file is required');
    return ctx;
  }

  const rows: GazetteerRow[] = [];
  for (const file of files) {
    const content = await fs.readFile(file, 'utf8');
    const headerProblem = gazetteerHeaderProblem(content);
    if (headerProblem) {
      ctx.addError(file, `File ${headerProblem}`);
      continue;
    }
    rows.push(...readGazetteerRows(content, file));
  }

  validateGazetteerRows(ctx, rows);
  return ctx;
}
