import { DISTRICT_SUFFIXES, type AdministrativeIndex } from './administrative_index.js';

function stripDistrictSuffixes(district: string): string {
  let stem = district;
  while (DISTRICT_SUFFIXES.some((suffix) => stem.endsWith(suffix))) {
    stem = stem.slice(0, -1);
  }
  return stem;
}

/**
 * Best-effort membership check used after an exact `validateDistrict` miss.
 * A district is accepted for `city` when one of the city's districts starts
 * with it, or when it starts with the suffix-less stem of one of them. This
 * is approximate: 白云鄂博矿区 passes for 广州市 because 白云区 is there.
 */
export function matchesDistrictLoosely(
  index: AdministrativeIndex,
  city: string,
  district: string
): boolean {
  const candidates = index.cityDistricts.get(city);
  if (!candidates) {
    return false;
  }

  for (const candidate of candidates) {
    if (candidate.startsWith(district)) {
      return true;
    }
    const stem = stripDistrictSuffixes(candidate);
    if (stem.length > 0 && district.startsWith(stem)) {
      return true;
    }
  }

  return false;
}
