import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { GeonamesHttpService } from '../../auxiliares/http/http.service';
import {
  GeocodeFetchFailedError,
  errorMessage,
  hasErrorCode,
} from '../../common/errors';
import {
  COUNTRY_CODE_PATTERN,
  GEOCODING_OPTIONS,
  RegionFileName,
} from '../geocoding.constants';
import { IGeocodingOptions } from '../models';
import { openGazetteerArchive } from '../utils/gazetteer-parser';
import { assertRegionText } from '../utils/region-names-parser';

/**
 * Caché en disco de los datasets de geonames: un zip por país y los tres
 * archivos de nombres de regiones
 *
 * - Un archivo cacheado es válido indefinidamente salvo que se fuerce la descarga
 * - La descarga va a un temporal y se renombra encima del archivo final, así
 *   una descarga fallida nunca corrompe una caché buena
 * - Exactamente una descarga por archivo por proceso: los pedidos concurrentes
 *   esperan la misma promesa en vuelo
 * - Un fallo también queda memorizado: no se reintenta (ni forzando) hasta
 *   reiniciar el proceso
 */
@Injectable()
export class GazetteerCacheService {
  private readonly logger = new Logger(GazetteerCacheService.name);
  private readonly fetches = new Map<string, Promise<string>>();
  private tempCounter = 0;

  constructor(
    private readonly http: GeonamesHttpService,
    @Inject(GEOCODING_OPTIONS)
    private readonly options: IGeocodingOptions,
  ) {}

  /**
   * Ruta de un archivo dentro de la caché
   */
  pathFor(fileName: string): string {
    return path.resolve(this.options.cacheDir, fileName);
  }

  /**
   * Asegura que existe el zip del país y devuelve su ruta.
   * Rechaza con GeocodeFetchFailedError si no se pudo obtener.
   */
  ensureCountryFile(countryCode: string, force = false): Promise<string> {
    const code = countryCode.trim().toUpperCase();

    return this.once(code, async () => {
      if (!COUNTRY_CODE_PATTERN.test(code)) {
        throw new GeocodeFetchFailedError(code, 'invalid ISO 3166 alpha-2 country code');
      }

      return await this.populate(code, `${code}.zip`, force, (body) =>
        openGazetteerArchive(body, code),
      );
    });
  }

  /**
   * Asegura que existe uno de los archivos de nombres de regiones
   */
  ensureRegionFile(fileName: RegionFileName, force = false): Promise<string> {
    return this.once(fileName, () =>
      this.populate(fileName, fileName, force, (body) => assertRegionText(body, fileName)),
    );
  }

  private once(key: string, fetch: () => Promise<string>): Promise<string> {
    const inFlight = this.fetches.get(key);
    if (inFlight) {
      this.logger.debug(`Reusing gazetteer request for ${key}`);
      return inFlight;
    }

    const request = fetch();
    this.fetches.set(key, request);
    return request;
  }

  private async populate(
    source: string,
    fileName: string,
    force: boolean,
    validate: (body: Buffer) => void,
  ): Promise<string> {
    const target = this.pathFor(fileName);
    const temp = `${target}.${process.pid}.${++this.tempCounter}.tmp`;
    let tempCreated = false;

    try {
      if (!force && (await this.exists(target))) {
        this.logger.debug(
          `File ${target} already exists, skipping download (force a download to refresh it)`,
        );
        return target;
      }

      await fs.mkdir(path.dirname(target), { recursive: true });

      const body = await this.http.download(fileName);

      // Validar antes del swap: una página de error no debe reemplazar la caché
      validate(body);

      tempCreated = true;
      await fs.writeFile(temp, body);
      await fs.rename(temp, target);

      this.logger.log(`Wrote ${body.length} bytes to ${target}`);
      return target;
    } catch (error) {
      if (tempCreated) {
        await fs.rm(temp, { force: true });
      }
      throw new GeocodeFetchFailedError(source, errorMessage(error), { cause: error });
    }
  }

  private async exists(file: string): Promise<boolean> {
    try {
      const stat = await fs.stat(file);
      return stat.isFile();
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }
}
