import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { errorMessage, errorStack } from '../../common/errors';
import { GEOCODING_OPTIONS } from '../geocoding.constants';
import {
  ICountryInfo,
  ICountryLoadStatus,
  IGeocodingOptions,
  IPlaceMatch,
  IRegionNames,
} from '../models';
import { emptyRegionNames } from '../utils/region-names-parser';
import { SpatialIndex } from '../utils/spatial-index';
import { GazetteerLoaderService } from './gazetteer-loader.service';

export interface IGeocodingStatus {
  enabled: boolean;
  ready: boolean;
  placeCount: number;
  cellCount: number;
  countries: ICountryLoadStatus[];
  regions: { countries: number; admin1: number; admin2: number };
}

/**
 * Geocoding inverso contra el gazetteer local
 *
 * Una instancia por proceso. El índice se construye una vez y después solo
 * se lee, así que los análisis concurrentes lo comparten sin coordinación.
 */
@Injectable()
export class GeocodingService implements OnModuleInit {
  private readonly logger = new Logger(GeocodingService.name);

  private index: SpatialIndex = SpatialIndex.empty();
  private countries: ICountryLoadStatus[] = [];
  private regions: IRegionNames = emptyRegionNames();
  private initialised = false;
  private pending: Promise<void> = Promise.resolve();
  private readonly initialisations = new Map<string, Promise<void>>();

  constructor(
    private readonly loader: GazetteerLoaderService,
    @Inject(GEOCODING_OPTIONS)
    private readonly options: IGeocodingOptions,
  ) {}

  onModuleInit(): void {
    if (this.options.countries.length === 0) {
      this.logger.log('GEOCODING_COUNTRIES is empty, stages will not be named');
      this.initialised = true;
      return;
    }

    // En segundo plano: el arranque del servidor no espera las descargas
    this.initialise(this.options.countries, this.options.forceDownload).catch(
      (error: unknown) => {
        this.logger.error(
          `Geocoding initialisation failed: ${errorMessage(error)}`,
          errorStack(error),
        );
      },
    );
  }

  /**
   * Carga los países y construye el índice. Se memoriza por conjunto de
   * países: llamar dos veces con los mismos países no vuelve a cargar.
   */
  initialise(countries: string[], force = false): Promise<void> {
    const key = [...new Set(countries.map((c) => c.trim().toUpperCase()))]
      .sort()
      .join(',');

    const existing = this.initialisations.get(key);
    if (existing) {
      return existing;
    }

    const run = this.buildIndex(countries, force);
    this.initialisations.set(key, run);
    this.pending = run;
    return run;
  }

  /**
   * Se resuelve cuando la última inicialización pedida terminó.
   * Nunca rechaza: un geocoding caído solo deja las etapas sin nombre.
   */
  async ready(): Promise<void> {
    try {
      await this.pending;
    } catch (error) {
      this.logger.debug(`Geocoding not available: ${errorMessage(error)}`);
    }
  }

  isReady(): boolean {
    return this.initialised;
  }

  reverseGeocode(lat: number, lon: number): IPlaceMatch | undefined {
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      return undefined;
    }

    try {
      const match = this.index.nearest(lat, lon);
      return match ? this.withRegionNames(match) : undefined;
    } catch (error) {
      this.logger.warn(`Reverse geocode failed at ${lat},${lon}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Nombre del lugar más cercano, o undefined si no hay coincidencia
   */
  describe(lat: number, lon: number): string | undefined {
    return this.reverseGeocode(lat, lon)?.place.name;
  }

  /**
   * País por código ISO (el Reino Unido es "GB")
   */
  getCountry(isoCode: string): ICountryInfo | undefined {
    return this.regions.countries.get(isoCode.trim().toUpperCase());
  }

  /**
   * Subdivisión de primer nivel, ej: "GB.ENG" -> "England"
   */
  getAdmin1(key: string): string | undefined {
    return this.regions.admin1.get(key);
  }

  /**
   * Subdivisión de segundo nivel, ej: "GB.ENG.J9" -> "Nottinghamshire"
   */
  getAdmin2(key: string): string | undefined {
    return this.regions.admin2.get(key);
  }

  getStatus(): IGeocodingStatus {
    return {
      enabled: this.options.countries.length > 0 || this.index.size > 0,
      ready: this.initialised,
      placeCount: this.index.size,
      cellCount: this.index.cellCount,
      countries: this.countries.map((status) => ({ ...status })),
      regions: {
        countries: this.regions.countries.size,
        admin1: this.regions.admin1.size,
        admin2: this.regions.admin2.size,
      },
    };
  }

  private withRegionNames(match: IPlaceMatch): IPlaceMatch {
    const { countryCode, admin1, admin2 } = match.place;

    return {
      ...match,
      country: this.getCountry(countryCode),
      admin1Name: admin1 ? this.getAdmin1(`${countryCode}.${admin1}`) : undefined,
      admin2Name:
        admin1 && admin2 ? this.getAdmin2(`${countryCode}.${admin1}.${admin2}`) : undefined,
    };
  }

  private async buildIndex(countries: string[], force: boolean): Promise<void> {
    const startedAt = Date.now();
    const result = await this.loader.load(countries, force);

    this.index = SpatialIndex.build(result.places, this.options.cellSizeDegrees);
    this.countries = result.countries;
    this.regions = result.regions;
    this.initialised = true;

    const failed = result.countries.filter((c) => c.status === 'failed');
    if (failed.length > 0) {
      this.logger.warn(
        `Gazetteer unavailable for ${failed.map((c) => c.countryCode).join(', ')}`,
      );
    }

    this.logger.log(
      `Spatial index ready: ${this.index.size} places in ${this.index.cellCount} cells (${Date.now() - startedAt}ms)`,
    );
  }
}
