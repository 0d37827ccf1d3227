import { GazetteerParseError } from '../../common/errors';
import { Continent, ICountryInfo, IRegionNames } from '../models';

const CONTINENTS: readonly Continent[] = ['AF', 'AS', 'EU', 'NA', 'OC', 'SA', 'AN'];

const isContinent = (code: string): code is Continent =>
  CONTINENTS.some((continent) => continent === code);

/**
 * Columnas de countryInfo.txt
 */
const COUNTRY_FIELD = {
  ISO_CODE: 0,
  NAME: 4,
  CONTINENT: 8,
} as const;

export interface IRegionParseResult<T> {
  entries: Map<string, T>;
  skipped: number;
}

export const emptyRegionNames = (): IRegionNames => ({
  countries: new Map(),
  admin1: new Map(),
  admin2: new Map(),
});

const dataLines = (text: string): string[] =>
  text.split(/\r?\n/).filter((line) => line.length > 0 && !line.startsWith('#'));

/**
 * Comprueba que una descarga es un archivo TSV de geonames y no, por
 * ejemplo, una página de error del servidor
 */
export function assertRegionText(buffer: Buffer, fileName: string): void {
  if (!dataLines(buffer.toString('utf8')).some((line) => line.includes('\t'))) {
    throw new GazetteerParseError(`${fileName}: not a tab separated geonames file`);
  }
}

/**
 * countryInfo.txt: todos los países (es pequeño, no se filtra)
 */
export function parseCountryInfo(text: string): IRegionParseResult<ICountryInfo> {
  const entries = new Map<string, ICountryInfo>();
  let skipped = 0;

  for (const line of dataLines(text)) {
    const fields = line.split('\t');
    const isoCode = fields[COUNTRY_FIELD.ISO_CODE] ?? '';
    const name = fields[COUNTRY_FIELD.NAME] ?? '';
    const continent = fields[COUNTRY_FIELD.CONTINENT] ?? '';

    if (!isoCode || !name || !isContinent(continent)) {
      skipped++;
      continue;
    }

    entries.set(isoCode, { isoCode, name, continent });
  }

  return { entries, skipped };
}

/**
 * admin1CodesASCII.txt / admin2Codes.txt: "clave \t nombre \t nombre ascii \t id".
 * Solo se guardan las claves de los países pedidos.
 */
export function parseAdminCodes(
  text: string,
  countries: ReadonlySet<string>,
): IRegionParseResult<string> {
  const entries = new Map<string, string>();
  let skipped = 0;

  for (const line of dataLines(text)) {
    const [key = '', name = ''] = line.split('\t');

    if (!countries.has(key.slice(0, 2))) {
      continue;
    }

    if (!name) {
      skipped++;
      continue;
    }

    entries.set(key, name);
  }

  return { entries, skipped };
}
