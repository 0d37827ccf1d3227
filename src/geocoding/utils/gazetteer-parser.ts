import AdmZip from 'adm-zip';
import { GazetteerParseError, errorMessage } from '../../common/errors';
import { POPULATED_PLACE_FEATURE_CLASS } from '../geocoding.constants';
import { IPlaceRecord } from '../models';

/**
 * Columnas del dump de geonames (separado por tabuladores)
 * https://download.geonames.org/export/dump/readme.txt
 */
const FIELD = {
  NAME: 1,
  ASCII_NAME: 2,
  LATITUDE: 4,
  LONGITUDE: 5,
  FEATURE_CLASS: 6,
  COUNTRY_CODE: 8,
  ADMIN1: 10,
  ADMIN2: 11,
  TIMEZONE: 17,
} as const;

export interface IGazetteerParseResult {
  places: IPlaceRecord[];
  skipped: number;
}

/**
 * Nombre de la entrada dentro del zip de un país (ej: GB.zip -> GB.txt)
 */
export const gazetteerEntryName = (countryCode: string): string =>
  `${countryCode}.txt`;

/**
 * Abre el zip de un país y valida que contiene la entrada esperada.
 * Se usa también antes de reemplazar la caché, para no pisar un archivo
 * bueno con una descarga corrupta.
 */
export function openGazetteerArchive(buffer: Buffer, countryCode: string): AdmZip {
  let zip: AdmZip;
  try {
    zip = new AdmZip(buffer);
  } catch (error) {
    throw new GazetteerParseError(
      `${countryCode}: not a valid zip archive (${errorMessage(error)})`,
    );
  }

  if (!zip.getEntry(gazetteerEntryName(countryCode))) {
    throw new GazetteerParseError(
      `${countryCode}: archive does not contain ${gazetteerEntryName(countryCode)}`,
    );
  }

  return zip;
}

/**
 * Lee los lugares poblados del zip de un país
 */
export function parseGazetteerArchive(
  buffer: Buffer,
  countryCode: string,
): IGazetteerParseResult {
  const zip = openGazetteerArchive(buffer, countryCode);
  const text = zip.readAsText(gazetteerEntryName(countryCode), 'utf8');
  return parseGazetteerText(text);
}

/**
 * Parsea las líneas TSV. Se quedan solo los lugares poblados (clase P);
 * las líneas sin nombre, país o coordenadas válidas se cuentan como saltadas.
 */
export function parseGazetteerText(text: string): IGazetteerParseResult {
  const places: IPlaceRecord[] = [];
  let skipped = 0;

  for (const line of text.split(/\r?\n/)) {
    if (line.length === 0) {
      continue;
    }

    const fields = line.split('\t');
    if (fields[FIELD.FEATURE_CLASS] !== POPULATED_PLACE_FEATURE_CLASS) {
      continue;
    }

    // Preferimos el nombre UTF-8; si viene vacío, la transliteración ASCII
    const name = fields[FIELD.NAME] || fields[FIELD.ASCII_NAME] || '';
    const countryCode = fields[FIELD.COUNTRY_CODE] ?? '';
    const lat = Number.parseFloat(fields[FIELD.LATITUDE] ?? '');
    const lon = Number.parseFloat(fields[FIELD.LONGITUDE] ?? '');

    if (!name || !countryCode || !Number.isFinite(lat) || !Number.isFinite(lon)) {
      skipped++;
      continue;
    }

    places.push({
      name,
      lat,
      lon,
      countryCode,
      admin1: fields[FIELD.ADMIN1] ?? '',
      admin2: fields[FIELD.ADMIN2] ?? '',
      timezone: fields[FIELD.TIMEZONE] ?? '',
    });
  }

  return { places, skipped };
}
