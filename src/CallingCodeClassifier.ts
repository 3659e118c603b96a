/**
 * Region code used for calling codes that do not belong to a single country, such as
 * 800 (International Toll Free Service) and 808 (International Shared Cost Service).
 */
export const REGION_CODE_FOR_NON_GEO_ENTITY = '001';

/**
 * Maps a country calling code to the region codes that share it.
 */
export interface CallingCodeClassifier {
  /**
   * Codes the classifier does not know return an empty list; this never throws.
   */
  getRegionCodesForCountryCode(countryCallingCode: number): readonly string[];
}

/**
 * Create a classifier from a calling code to region code table, e.g.
 * `{ 1: ['US', 'CA'], 44: ['GB', 'GG'], 800: ['001'] }`.
 */
export const createCallingCodeClassifier = (
  countryCodeToRegionCodes: Record<number, readonly string[]>
): CallingCodeClassifier => {
  const table = new Map<number, readonly string[]>();
  for (const [code, regionCodes] of Object.entries(countryCodeToRegionCodes)) {
    table.set(Number(code), [...regionCodes]);
  }

  return {
    getRegionCodesForCountryCode: (countryCallingCode: number): readonly string[] =>
      table.get(countryCallingCode) ?? []
  };
};

/**
 * A calling code is non-geographical if it maps to the non-geographical region code and
 * nothing else. Unknown codes are therefore not non-geographical.
 */
export const isNonGeographical = (
  classifier: CallingCodeClassifier,
  countryCallingCode: number
): boolean => {
  const regionCodes = classifier.getRegionCodesForCountryCode(countryCallingCode);
  return regionCodes.length === 1 && regionCodes[0] === REGION_CODE_FOR_NON_GEO_ENTITY;
};
