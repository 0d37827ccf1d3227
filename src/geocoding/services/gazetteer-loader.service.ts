import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { errorMessage } from '../../common/errors';
import { REGION_FILES, RegionFileName } from '../geocoding.constants';
import {
  ICountryLoadStatus,
  IGazetteerLoadResult,
  IPlaceRecord,
  IRegionNames,
} from '../models';
import { parseGazetteerArchive } from '../utils/gazetteer-parser';
import {
  IRegionParseResult,
  emptyRegionNames,
  parseAdminCodes,
  parseCountryInfo,
} from '../utils/region-names-parser';
import { GazetteerCacheService } from './gazetteer-cache.service';

/**
 * Carga los lugares de un conjunto de países y los nombres de sus regiones
 *
 * Los países se cargan en paralelo; el fallo de uno (red, timeout, zip
 * inválido) queda registrado en su estado y no aborta al resto. Sin un
 * archivo de regiones los lugares se cargan igual, solo sin esos nombres.
 */
@Injectable()
export class GazetteerLoaderService {
  private readonly logger = new Logger(GazetteerLoaderService.name);

  constructor(private readonly cache: GazetteerCacheService) {}

  async load(countries: string[], force = false): Promise<IGazetteerLoadResult> {
    const codes = [...new Set(countries.map((code) => code.trim().toUpperCase()))];

    if (codes.length === 0) {
      this.logger.log('No countries requested, geocoding disabled');
      return { places: [], countries: [], regions: emptyRegionNames() };
    }

    const [results, regions] = await Promise.all([
      Promise.all(codes.map((code) => this.loadCountry(code, force))),
      this.loadRegions(codes, force),
    ]);

    // Orden determinista: el orden pedido define quién "se cargó primero"
    const places: IPlaceRecord[] = [];
    const statuses: ICountryLoadStatus[] = [];
    for (const result of results) {
      places.push(...result.places);
      statuses.push(result.status);
    }

    this.logger.log(
      `Loaded ${places.length} places from ${statuses.filter((s) => s.status === 'loaded').length}/${codes.length} country files`,
    );

    return { places, countries: statuses, regions };
  }

  private async loadRegions(codes: string[], force: boolean): Promise<IRegionNames> {
    const requested = new Set(codes);

    const [countries, admin1, admin2] = await Promise.all([
      this.loadRegionFile(REGION_FILES.COUNTRY_INFO, force, parseCountryInfo),
      this.loadRegionFile(REGION_FILES.ADMIN1, force, (text) =>
        parseAdminCodes(text, requested),
      ),
      this.loadRegionFile(REGION_FILES.ADMIN2, force, (text) =>
        parseAdminCodes(text, requested),
      ),
    ]);

    return { countries, admin1, admin2 };
  }

  private async loadRegionFile<T>(
    fileName: RegionFileName,
    force: boolean,
    parse: (text: string) => IRegionParseResult<T>,
  ): Promise<Map<string, T>> {
    try {
      const file = await this.cache.ensureRegionFile(fileName, force);
      const { entries, skipped } = parse(await fs.readFile(file, 'utf8'));

      if (skipped > 0) {
        this.logger.warn(`${fileName}: skipped ${skipped} lines with empty fields`);
      }
      this.logger.log(`Loaded ${entries.size} entries from ${fileName}`);

      return entries;
    } catch (error) {
      this.logger.warn(`${fileName} unavailable, region names disabled: ${errorMessage(error)}`);
      return new Map<string, T>();
    }
  }

  private async loadCountry(
    code: string,
    force: boolean,
  ): Promise<{ places: IPlaceRecord[]; status: ICountryLoadStatus }> {
    try {
      const file = await this.cache.ensureCountryFile(code, force);
      const buffer = await fs.readFile(file);
      const { places, skipped } = parseGazetteerArchive(buffer, code);

      if (skipped > 0) {
        this.logger.warn(`${code}: skipped ${skipped} lines with missing name or coordinates`);
      }
      this.logger.log(`Loaded ${places.length} places from ${code}.txt`);

      return {
        places,
        status: { countryCode: code, status: 'loaded', placeCount: places.length },
      };
    } catch (error) {
      this.logger.warn(`Gazetteer for ${code} unavailable: ${errorMessage(error)}`);

      return {
        places: [],
        status: {
          countryCode: code,
          status: 'failed',
          placeCount: 0,
          error: errorMessage(error),
        },
      };
    }
  }
}
