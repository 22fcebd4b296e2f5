export interface AdministrativeRecord {
  province: string;
  city: string;
  /** Absent for cities that are not subdivided (东莞市, 中山市, ...). */
  district?: string;
}

export interface ParsedAddress {
  province?: string;
  city?: string;
  district?: string;
  /** Unconsumed remainder of the input, right-trimmed. */
  detail: string;
}

export function emptyParsedAddress(): ParsedAddress {
  return { detail: '' };
}

export function recordFullName(record: AdministrativeRecord): string {
  return `${record.province}${record.city}${record.district ?? ''}`;
}

export function hasProvince(parsed: ParsedAddress): boolean {
  return parsed.province !== undefined;
}

export function hasCity(parsed: ParsedAddress): boolean {
  return parsed.city !== undefined;
}

export function hasDistrict(parsed: ParsedAddress): boolean {
  return parsed.district !== undefined;
}

export function isCompleteAddress(parsed: ParsedAddress): boolean {
  return hasProvince(parsed) && hasCity(parsed) && hasDistrict(parsed);
}

/**
 * Display form of a parse result. A municipality's city repeats its province,
 * so the city is left out when both are equal.
 */
export function formatFullAddress(parsed: ParsedAddress): string {
  const parts: string[] = [];

  if (parsed.province !== undefined) {
    parts.push(parsed.province);
  }
  if (parsed.city !== undefined && parsed.city !== parsed.province) {
    parts.push(parsed.city);
  }
  if (parsed.district !== undefined) {
    parts.push(parsed.district);
  }
  parts.push(parsed.detail);

  return parts.join('');
}
