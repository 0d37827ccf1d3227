import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { errorMessage } from '../common/errors';
import { GeocodingService } from '../geocoding/services/geocoding.service';

type ServiceCheck<T> =
  | { status: 'up'; details: T }
  | { status: 'down'; details: { error: string } };

const toCheck = <T>(result: PromiseSettledResult<T>): ServiceCheck<T> =>
  result.status === 'fulfilled'
    ? { status: 'up', details: result.value }
    : { status: 'down', details: { error: errorMessage(result.reason) } };

@Injectable()
export class HealthService {
  constructor(
    private readonly geocoding: GeocodingService,
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  async check() {
    const [databaseCheck, geocodingCheck] = await Promise.allSettled([
      this.checkDatabase(),
      this.checkGeocoding(),
    ]);

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      services: {
        database: toCheck(databaseCheck),
        geocoding: toCheck(geocodingCheck),
      },
    };
  }

  ready() {
    const databaseReady = this.dataSource.isInitialized;
    const geocodingReady = this.geocoding.isReady();

    // El geocoding es best-effort: sin él se analiza igual
    return {
      status: databaseReady ? 'ready' : 'not ready',
      database: databaseReady,
      geocoding: geocodingReady,
    };
  }

  geocodingStatus() {
    return this.geocoding.getStatus();
  }

  private async checkDatabase() {
    try {
      // Verificar conexión ejecutando una query simple
      const result = await this.dataSource.query<Array<{ now: Date }>>(
        'SELECT NOW() as now',
      );

      return {
        message: 'Database is healthy',
        connected: true,
        serverTime: result[0]?.now,
      };
    } catch (error) {
      throw new Error(`Database check failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async checkGeocoding() {
    const status = this.geocoding.getStatus();
    const failed = status.countries.filter((country) => country.status === 'failed');

    return {
      message: !status.enabled
        ? 'Geocoding disabled (no countries configured)'
        : failed.length > 0
          ? `Gazetteer unavailable for ${failed.map((c) => c.countryCode).join(', ')}`
          : 'Geocoding is healthy',
      ...status,
    };
  }
}
