export const GEOCODING_OPTIONS = 'GEOCODING_OPTIONS';

// Solo lugares poblados (ciudades, pueblos, aldeas)
export const POPULATED_PLACE_FEATURE_CLASS = 'P';

export const COUNTRY_CODE_PATTERN = /^[A-Z]{2}$/;

// Archivos de nombres de regiones (uno global por tipo, no por país)
export const REGION_FILES = {
  COUNTRY_INFO: 'countryInfo.txt',
  ADMIN1: 'admin1CodesASCII.txt',
  ADMIN2: 'admin2Codes.txt',
} as const;

export type RegionFileName = (typeof REGION_FILES)[keyof typeof REGION_FILES];
