import AdmZip from 'adm-zip';
import { gazetteerEntryName } from '../geocoding/utils/gazetteer-parser';

export interface IGazetteerLine {
  name: string;
  asciiName?: string;
  lat: number | string;
  lon: number | string;
  featureClass?: string;
  countryCode?: string;
  admin1?: string;
  admin2?: string;
  timezone?: string;
}

/**
 * Línea TSV con las 19 columnas del dump de geonames
 */
export function gazetteerLine(line: IGazetteerLine, id = 1): string {
  const fields = new Array<string>(19).fill('');
  fields[0] = String(id);
  fields[1] = line.name;
  fields[2] = line.asciiName ?? line.name;
  fields[4] = String(line.lat);
  fields[5] = String(line.lon);
  fields[6] = line.featureClass ?? 'P';
  fields[7] = 'PPL';
  fields[8] = line.countryCode ?? 'GB';
  fields[10] = line.admin1 ?? 'ENG';
  fields[11] = line.admin2 ?? 'K2';
  fields[14] = '1000';
  fields[17] = line.timezone ?? 'Europe/London';
  fields[18] = '2024-01-01';
  return fields.join('\t');
}

export function gazetteerZip(countryCode: string, lines: IGazetteerLine[]): Buffer {
  const zip = new AdmZip();
  const text = lines.map((line, index) => gazetteerLine(line, index + 1)).join('\n');
  zip.addFile(gazetteerEntryName(countryCode), Buffer.from(`${text}\n`, 'utf8'));
  return zip.toBuffer();
}

/**
 * countryInfo.txt con su cabecera de comentarios
 */
export function countryInfoText(
  countries: Array<{ isoCode: string; name: string; continent: string }>,
): string {
  const header = [
    '# GeoNames.org Country Information',
    '#ISO\tISO3\tISO-Numeric\tfips\tCountry\tCapital\tArea(in sq km)\tPopulation\tContinent',
  ];
  const rows = countries.map((country) => {
    const fields = new Array<string>(19).fill('');
    fields[0] = country.isoCode;
    fields[4] = country.name;
    fields[8] = country.continent;
    return fields.join('\t');
  });
  return `${[...header, ...rows].join('\n')}\n`;
}

/**
 * admin1CodesASCII.txt / admin2Codes.txt: clave, nombre, nombre ascii, id
 */
export function adminCodesText(codes: Array<[key: string, name: string]>): string {
  const lines = codes.map(([key, name], index) => `${key}\t${name}\t${name}\t${index + 1}`);
  return `${lines.join('\n')}\n`;
}
