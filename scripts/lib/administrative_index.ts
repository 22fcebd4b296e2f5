import type { AdministrativeRecord } from './parsed_address.js';

export const MUNICIPALITIES = ['北京市', '上海市', '天津市', '重庆市'] as const;

/** Prefecture-level cities with no district subdivision. */
export const NO_DISTRICT_CITIES = ['东莞市', '中山市', '儋州市', '嘉峪关市'] as const;

export const CITY_SUFFIX = '市';
export const DISTRICT_SUFFIXES = ['区', '县', '市', '旗'] as const;

const MUNICIPALITY_SET: ReadonlySet<string> = new Set(MUNICIPALITIES);
const NO_DISTRICT_CITY_SET: ReadonlySet<string> = new Set(NO_DISTRICT_CITIES);

export interface DistrictOwner {
  province: string;
  city: string;
}

/** Removes every trailing repetition of `suffix`. */
export function stripSuffix(name: string, suffix: string): string {
  let stem = name;
  while (suffix.length > 0 && stem.endsWith(suffix)) {
    stem = stem.slice(0, -suffix.length);
  }
  return stem;
}

/** Abbreviations of a district name, one per matching district suffix. */
export function districtAbbreviations(district: string): string[] {
  const abbreviations: string[] = [];
  for (const suffix of DISTRICT_SUFFIXES) {
    if (!district.endsWith(suffix)) {
      continue;
    }
    const stem = stripSuffix(district, suffix);
    if (stem.length > 0) {
      abbreviations.push(stem);
    }
  }
  return abbreviations;
}

export function cityAbbreviation(city: string): string | undefined {
  if (!city.endsWith(CITY_SUFFIX)) {
    return undefined;
  }
  const stem = stripSuffix(city, CITY_SUFFIX);
  return stem.length > 0 ? stem : undefined;
}

function addToSetMap(map: Map<string, Set<string>>, key: string, value: string): void {
  let values = map.get(key);
  if (!values) {
    values = new Set();
    map.set(key, values);
  }
  values.add(value);
}

function addOwner(map: Map<string, DistrictOwner[]>, key: string, owner: DistrictOwner): void {
  let owners = map.get(key);
  if (!owners) {
    owners = [];
    map.set(key, owners);
  }
  if (!owners.some((entry) => entry.province === owner.province && entry.city === owner.city)) {
    owners.push(owner);
  }
}

const EMPTY_OWNERS: readonly DistrictOwner[] = [];

export class AdministrativeIndex {
  readonly provinces = new Set<string>();
  readonly provinceCities = new Map<string, Set<string>>();
  /** Canonical and abbreviated city names -> canonical province. */
  readonly cityToProvince = new Map<string, string>();
  readonly cityDistricts = new Map<string, Set<string>>();
  /** Canonical and abbreviated district names -> every owning (province, city). */
  readonly districtToCity = new Map<string, DistrictOwner[]>();
  readonly cities = new Set<string>();
  readonly districts = new Set<string>();

  private constructor() {}

  static build(records: Iterable<AdministrativeRecord>): AdministrativeIndex {
    const index = new AdministrativeIndex();

    for (const { province, city, district } of records) {
      index.provinces.add(province);
      addToSetMap(index.provinceCities, province, city);

      index.cities.add(city);
      index.cityToProvince.set(city, province);
      const shortCity = cityAbbreviation(city);
      if (shortCity) {
        index.cityToProvince.set(shortCity, province);
      }

      if (district === undefined) {
        continue;
      }

      index.districts.add(district);
      addToSetMap(index.cityDistricts, city, district);

      const owner = { province, city };
      addOwner(index.districtToCity, district, owner);
      for (const abbreviation of districtAbbreviations(district)) {
        addOwner(index.districtToCity, abbreviation, owner);
      }
    }

    return index;
  }

  isMunicipality(province: string): boolean {
    return MUNICIPALITY_SET.has(province);
  }

  isNoDistrictCity(city: string): boolean {
    return NO_DISTRICT_CITY_SET.has(city);
  }

  findProvinceByCity(city: string): string | undefined {
    return this.cityToProvince.get(city);
  }

  findCitiesByDistrict(district: string): readonly DistrictOwner[] {
    return this.districtToCity.get(district) ?? EMPTY_OWNERS;
  }

  validateDistrict(city: string, district: string): boolean {
    return this.cityDistricts.get(city)?.has(district) ?? false;
  }
}
