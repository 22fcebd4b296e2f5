import {
  AdministrativeIndex,
  CITY_SUFFIX,
  cityAbbreviation,
  districtAbbreviations,
  type DistrictOwner
} from './administrative_index.js';
import { matchesDistrictLoosely } from './district_validation.js';
import { loadGazetteer } from './gazetteer.js';
import { emptyParsedAddress, type AdministrativeRecord, type ParsedAddress } from './parsed_address.js';
import { PROVINCE_ALIASES, PROVINCE_SUFFIX } from './province_aliases.js';
import { Trie, type PrefixMatch } from './trie.js';

/** District suffixes that mark a fully qualified district name. */
const QUALIFIED_DISTRICT_SUFFIXES = ['区', '县', '旗'] as const;

/** Tried in order when completing a short district name. */
const NORMALIZE_DISTRICT_SUFFIXES = ['区', '县', '市'] as const;

/** Shorter district abbreviations collide too often to be matched on their own. */
const MIN_DISTRICT_ABBREVIATION_LENGTH = 2;

const EMPTY_SET: ReadonlySet<string> = new Set();

function shouldPreferDistrict(
  province: string | undefined,
  cityMatch: PrefixMatch<string> | undefined,
  districtMatch: PrefixMatch<string>
): boolean {
  if (province !== undefined) {
    return false;
  }
  if (!cityMatch) {
    return true;
  }
  return (
    districtMatch.length > cityMatch.length ||
    QUALIFIED_DISTRICT_SUFFIXES.some((suffix) => districtMatch.value.endsWith(suffix))
  );
}

function uniqueOwner(owners: readonly DistrictOwner[]): DistrictOwner | undefined {
  return owners.length === 1 ? owners[0] : undefined;
}

export class AddressParser {
  private readonly provinceTrie = new Trie<string>();
  private readonly cityTrie = new Trie<string>();
  private readonly districtTrie = new Trie<string>();

  private constructor(
    private readonly index: AdministrativeIndex,
    private readonly aliases: ReadonlyMap<string, string>
  ) {
    for (const province of index.provinces) {
      this.provinceTrie.insert(province, province);
    }
    for (const [short, full] of aliases) {
      if (index.provinces.has(full)) {
        this.provinceTrie.insert(short, full);
      }
    }

    for (const city of index.cities) {
      this.cityTrie.insert(city, city);
      const short = cityAbbreviation(city);
      if (short) {
        this.cityTrie.insert(short, city);
      }
    }

    for (const district of index.districts) {
      this.districtTrie.insert(district, district);
      for (const short of districtAbbreviations(district)) {
        if ([...short].length >= MIN_DISTRICT_ABBREVIATION_LENGTH) {
          this.districtTrie.insert(short, district);
        }
      }
    }
  }

  /**
   * Builds a parser over an already de-duplicated, non-empty record list.
   * Loading and checking the records is the caller's job.
   */
  static fromRecords(
    records: Iterable<AdministrativeRecord>,
    aliases: ReadonlyMap<string, string> = PROVINCE_ALIASES
  ): AddressParser {
    return new AddressParser(AdministrativeIndex.build(records), aliases);
  }

  get administrativeIndex(): AdministrativeIndex {
    return this.index;
  }

  /**
   * Extracts province, city and district from the start of `address`. Never
   * throws: whatever is not recognized ends up in `detail`.
   */
  parse(address: string): ParsedAddress {
    const result = emptyParsedAddress();
    let remaining = address.trim();
    if (!remaining) {
      return result;
    }

    const provinceMatch = this.provinceTrie.findLongestPrefix(remaining);
    if (provinceMatch) {
      result.province = provinceMatch.value;
      remaining = remaining.slice(provinceMatch.length);

      if (this.index.isMunicipality(provinceMatch.value)) {
        result.city = provinceMatch.value;
        remaining = this.consumeMunicipalDistrict(result, provinceMatch.value, remaining);
        result.detail = remaining.trimEnd();
        return result;
      }
    }

    const cityMatch = this.cityTrie.findLongestPrefix(remaining);
    const districtMatch = this.districtTrie.findLongestPrefix(remaining);

    if (districtMatch && shouldPreferDistrict(result.province, cityMatch, districtMatch)) {
      result.district = districtMatch.value;
      remaining = remaining.slice(districtMatch.length);

      const owner = uniqueOwner(this.index.findCitiesByDistrict(districtMatch.value));
      if (owner) {
        result.province = owner.province;
        result.city = owner.city;
      }
    } else if (cityMatch && this.cityBelongsTo(cityMatch.value, result.province)) {
      result.city = cityMatch.value;
      remaining = remaining.slice(cityMatch.length);

      if (result.province === undefined) {
        result.province = this.index.findProvinceByCity(cityMatch.value);
      }
    }

    if (result.district === undefined) {
      remaining = this.consumeDistrict(result, remaining);
    }

    if (
      result.province !== undefined &&
      result.city === undefined &&
      this.index.isMunicipality(result.province)
    ) {
      result.city = result.province;
    }

    result.detail = remaining.trimEnd();
    return result;
  }

  parseBatch(addresses: readonly string[]): ParsedAddress[] {
    return addresses.map((address) => this.parse(address));
  }

  isValidAddress(address: string): boolean {
    const result = this.parse(address);
    return result.province !== undefined || result.city !== undefined;
  }

  /**
   * Expands each part to its canonical name and concatenates them. Unlike
   * `formatFullAddress`, a municipality keeps its repeated city name.
   */
  normalize(province: string, city: string, district?: string): string {
    const parts = [this.resolveProvince(province), this.resolveCity(city)];
    if (district !== undefined) {
      parts.push(this.resolveDistrict(district));
    }
    return parts.join('');
  }

  resolveProvince(province: string): string {
    const alias = this.aliases.get(province);
    if (alias !== undefined) {
      return alias;
    }
    if (this.index.provinces.has(province)) {
      return province;
    }

    const withSuffix = `${province}${PROVINCE_SUFFIX}`;
    return this.index.provinces.has(withSuffix) ? withSuffix : province;
  }

  resolveCity(city: string): string {
    if (this.index.cities.has(city)) {
      return city;
    }

    const withSuffix = `${city}${CITY_SUFFIX}`;
    return this.index.cities.has(withSuffix) ? withSuffix : city;
  }

  resolveDistrict(district: string): string {
    if (this.index.districts.has(district)) {
      return district;
    }

    for (const suffix of NORMALIZE_DISTRICT_SUFFIXES) {
      const withSuffix = `${district}${suffix}`;
      if (this.index.districts.has(withSuffix)) {
        return withSuffix;
      }
    }
    return district;
  }

  provinces(): ReadonlySet<string> {
    return this.index.provinces;
  }

  citiesOfProvince(province: string): ReadonlySet<string> {
    return this.index.provinceCities.get(this.resolveProvince(province)) ?? EMPTY_SET;
  }

  districtsOfCity(city: string): ReadonlySet<string> {
    return this.index.cityDistricts.get(this.resolveCity(city)) ?? EMPTY_SET;
  }

  private cityBelongsTo(city: string, province: string | undefined): boolean {
    return province === undefined || this.index.findProvinceByCity(city) === province;
  }

  private districtFitsCity(city: string, district: string): boolean {
    return (
      this.index.validateDistrict(city, district) ||
      matchesDistrictLoosely(this.index, city, district)
    );
  }

  private consumeMunicipalDistrict(
    result: ParsedAddress,
    municipality: string,
    remaining: string
  ): string {
    const match = this.districtTrie.findLongestPrefix(remaining);
    if (!match || !this.index.validateDistrict(municipality, match.value)) {
      return remaining;
    }

    result.district = match.value;
    return remaining.slice(match.length);
  }

  private consumeDistrict(result: ParsedAddress, remaining: string): string {
    const match = this.districtTrie.findLongestPrefix(remaining);
    if (!match) {
      return remaining;
    }
    if (result.city !== undefined && !this.districtFitsCity(result.city, match.value)) {
      return remaining;
    }

    result.district = match.value;

    if (result.city === undefined) {
      const owners = this.index.findCitiesByDistrict(match.value);
      const owner = uniqueOwner(owners);
      const province = result.province;

      if (owner) {
        result.province = owner.province;
        result.city = owner.city;
      } else if (province !== undefined) {
        const city = owners.find((entry) => entry.province === province)?.city;
        if (city !== undefined) {
          result.city = city;
        }
      }
    }

    if (result.province === undefined && result.city !== undefined) {
      result.province = this.index.findProvinceByCity(result.city);
    }

    return remaining.slice(match.length);
  }
}

let defaultParser: Promise<AddressParser> | undefined;

async function createDefaultParser(): Promise<AddressParser> {
  return AddressParser.fromRecords(await loadGazetteer());
}

/**
 * Shared parser over the bundled gazetteer, built on first use. A failed
 * load is not cached so the next call retries.
 */
export async function loadDefaultParser(): Promise<AddressParser> {
  if (!defaultParser) {
    defaultParser = createDefaultParser();
  }

  try {
    return await defaultParser;
  } catch (error) {
    defaultParser = undefined;
    throw error;
  }
}

export async function parseAddress(address: string): Promise<ParsedAddress> {
  return (await loadDefaultParser()).parse(address);
}

export async function normalizeAddress(
  province: string,
  city: string,
  district?: string
): Promise<string> {
  return (await loadDefaultParser()).normalize(province, city, district);
}
