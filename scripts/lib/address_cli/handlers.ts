import fs from 'fs-extra';

import type { AddressParser } from '../address_parser.js';
import {
  inputValidated,
  selectOptionalOrCustom,
  selectOrCustom,
  type PromptAdapter
} from '../cli_prompts.js';
import {
  resolveUserPath,
  stableJson,
  toPosixRelative,
  writeJsonFile,
  type RunOptions,
  type WriteResult
} from '../io.js';
import { isCompleteAddress, type ParsedAddress } from '../parsed_address.js';

export interface BatchEntry {
  input: string;
  province: string | null;
  city: string | null;
  district: string | null;
  detail: string;
  complete: boolean;
}

export interface BatchResult {
  entries: BatchEntry[];
  outputPath?: string;
  write?: WriteResult;
}

export interface ExploreResult {
  province: string;
  city: string;
  district?: string;
  normalized: string;
}

function requiredOption(options: Map<string, string>, key: string): string {
  const value = options.get(key)?.trim();
  if (!value) {
    throw new Error(`Missing required option '--${key}'`);
  }
  return value;
}

function sortNames(values: Iterable<string>): string[] {
  return Array.from(values).sort((a, b) => a.localeCompare(b, 'zh-Hans-CN'));
}

export function formatParsedAddress(parsed: ParsedAddress): string[] {
  return [
    `province: ${parsed.province ?? '-'}`,
    `city: ${parsed.city ?? '-'}`,
    `district: ${parsed.district ?? '-'}`,
    `detail: "${parsed.detail}"`,
    `complete: ${isCompleteAddress(parsed)}`
  ];
}

export function toBatchEntry(input: string, parsed: ParsedAddress): BatchEntry {
  return {
    input,
    province: parsed.province ?? null,
    city: parsed.city ?? null,
    district: parsed.district ?? null,
    detail: parsed.detail,
    complete: isCompleteAddress(parsed)
  };
}

export function readAddressLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function runParseCommand(
  parser: AddressParser,
  prompt: PromptAdapter,
  options: Map<string, string>
): Promise<ParsedAddress> {
  const address =
    options.get('address') ??
    (await inputValidated(prompt, {
      message: 'Address: ',
      validate: (value) => (value.length === 0 ? 'Address is required' : undefined)
    }));

  const parsed = parser.parse(address);
  for (const line of formatParsedAddress(parsed)) {
    console.log(line);
  }
  return parsed;
}

export async function runBatchCommand(
  parser: AddressParser,
  options: Map<string, string>,
  runOptions: RunOptions
): Promise<BatchResult> {
  const inputPath = resolveUserPath(requiredOption(options, 'input'));
  if (!(await fs.pathExists(inputPath))) {
    throw new Error(`Input file not found: ${toPosixRelative(inputPath)}`);
  }

  const addresses = readAddressLines(await fs.readFile(inputPath, 'utf8'));
  const results = parser.parseBatch(addresses);
  const entries = addresses.map((address, index) => toBatchEntry(address, results[index]));

  const output = options.get('output');
  if (!output) {
    process.stdout.write(stableJson(entries));
    return { entries };
  }

  const outputPath = resolveUserPath(output);
  const write = await writeJsonFile(outputPath, entries, runOptions);
  if (write.changed) {
    const status = runOptions.check ? 'Would update' : 'Updated';
    console.log(`${status} ${toPosixRelative(outputPath)} (${entries.length} entries)`);
  } else {
    console.log(`${toPosixRelative(outputPath)} is up to date (${entries.length} entries)`);
  }

  return { entries, outputPath, write };
}

export function runNormalizeCommand(parser: AddressParser, options: Map<string, string>): string {
  const normalized = parser.normalize(
    requiredOption(options, 'province'),
    requiredOption(options, 'city'),
    options.get('district')
  );
  console.log(normalized);
  return normalized;
}

export async function runExploreCommand(
  parser: AddressParser,
  prompt: PromptAdapter
): Promise<ExploreResult> {
  const province = await selectOrCustom(prompt, {
    message: 'Province:',
    options: sortNames(parser.provinces()),
    customInputMessage: 'Province (full or short name): ',
    customLabel: 'Type a province...',
    normalizeCustom: (value) => parser.resolveProvince(value),
    validateCustom: (value) =>
      parser.provinces().has(value) ? undefined : `Unknown province '${value}'`
  });

  const cities = parser.citiesOfProvince(province);
  const city = await selectOrCustom(prompt, {
    message: 'City:',
    options: sortNames(cities),
    customInputMessage: 'City (full or short name): ',
    customLabel: 'Type a city...',
    normalizeCustom: (value) => parser.resolveCity(value),
    validateCustom: (value) => (cities.has(value) ? undefined : `${value} is not in ${province}`)
  });

  const districts = parser.districtsOfCity(city);
  const district =
    districts.size === 0
      ? undefined
      : await selectOptionalOrCustom(prompt, {
          message: 'District:',
          options: sortNames(districts),
          customInputMessage: 'District (full or short name, empty to skip): ',
          customLabel: 'Type a district...',
          skipLabel: 'No district',
          normalizeCustom: (value) => parser.resolveDistrict(value),
          validateCustom: (value) => (districts.has(value) ? undefined : `${value} is not in ${city}`)
        });

  const normalized = parser.normalize(province, city, district);
  console.log(normalized);
  return { province, city, district, normalized };
}
