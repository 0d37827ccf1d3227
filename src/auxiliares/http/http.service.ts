import { Injectable, Logger } from '@nestjs/common';
import { HttpService as NestHttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { GEONAMES_BASE_URL, GEONAMES_TIMEOUT_MS } from '../../env';
import { errorMessage } from '../../common/errors';

/**
 * Cliente HTTP para descargar los dumps de geonames
 */
@Injectable()
export class GeonamesHttpService {
  private readonly logger = new Logger(GeonamesHttpService.name);

  constructor(private readonly httpService: NestHttpService) {}

  /**
   * Descarga un archivo completo a memoria.
   * Un timeout se propaga como error (el llamador lo registra por país).
   */
  async download(fileName: string): Promise<Buffer> {
    const url = `${GEONAMES_BASE_URL}${fileName}`;

    try {
      this.logger.debug(`GET ${url}`);

      const response = await firstValueFrom(
        this.httpService.get<ArrayBuffer>(url, {
          responseType: 'arraybuffer',
          timeout: GEONAMES_TIMEOUT_MS,
        }),
      );

      const body = Buffer.from(response.data);
      this.logger.debug(`Downloaded ${body.length} bytes from ${url}`);

      return body;
    } catch (error) {
      this.logger.error(`Error in GET ${url}: ${errorMessage(error)}`);
      throw error;
    }
  }
}
