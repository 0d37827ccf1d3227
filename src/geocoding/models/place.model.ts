/**
 * Lugar del gazetteer (geonames), solo los campos que usamos
 */
export interface IPlaceRecord {
  readonly name: string;
  readonly lat: number;
  readonly lon: number;
  readonly countryCode: string;
  readonly admin1: string; // código de primer nivel (ej: "ENG")
  readonly admin2: string; // código de segundo nivel (ej: "J9")
  readonly timezone: string;
}

export type Continent = 'AF' | 'AS' | 'EU' | 'NA' | 'OC' | 'SA' | 'AN';

/**
 * País según countryInfo.txt
 */
export interface ICountryInfo {
  isoCode: string;
  name: string;
  continent: Continent;
}

/**
 * Nombres de países y subdivisiones, por clave de geonames
 * (admin1: "GB.ENG", admin2: "GB.ENG.J9")
 */
export interface IRegionNames {
  countries: ReadonlyMap<string, ICountryInfo>;
  admin1: ReadonlyMap<string, string>;
  admin2: ReadonlyMap<string, string>;
}

/**
 * Resultado de una búsqueda inversa
 */
export interface IPlaceMatch {
  place: IPlaceRecord;
  distanceMetres: number;
  country?: ICountryInfo;
  admin1Name?: string; // ej: "England"
  admin2Name?: string; // ej: "Oxfordshire"
}

/**
 * Estado de carga de un país
 */
export interface ICountryLoadStatus {
  countryCode: string;
  status: 'loaded' | 'failed';
  placeCount: number;
  error?: string;
}

/**
 * Resultado de cargar un conjunto de países
 */
export interface IGazetteerLoadResult {
  places: IPlaceRecord[];
  countries: ICountryLoadStatus[];
  regions: IRegionNames;
}

/**
 * Opciones del subsistema de geocoding (inyectadas)
 */
export interface IGeocodingOptions {
  cacheDir: string;
  countries: string[];
  forceDownload: boolean;
  cellSizeDegrees: number;
}
