import { Module } from '@nestjs/common';
import { AuxiliaresModule } from '../auxiliares/auxiliares.module';
import {
  GEOCODING_COUNTRIES,
  GEONAMES_DIR,
  GEONAMES_FORCE_DOWNLOAD,
  SPATIAL_INDEX_CELL_DEGREES,
} from '../env';
import { GEOCODING_OPTIONS } from './geocoding.constants';
import { IGeocodingOptions } from './models';
import {
  GazetteerCacheService,
  GazetteerLoaderService,
  GeocodingService,
} from './services';

@Module({
  imports: [AuxiliaresModule],
  providers: [
    {
      provide: GEOCODING_OPTIONS,
      useValue: {
        cacheDir: GEONAMES_DIR,
        countries: GEOCODING_COUNTRIES,
        forceDownload: GEONAMES_FORCE_DOWNLOAD,
        cellSizeDegrees: SPATIAL_INDEX_CELL_DEGREES,
      } satisfies IGeocodingOptions,
    },
    GazetteerCacheService,
    GazetteerLoaderService,
    GeocodingService,
  ],
  exports: [GeocodingService],
})
export class GeocodingModule {}
