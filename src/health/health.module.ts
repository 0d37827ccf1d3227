import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { DatabaseModule } from '../database/database.module';
import { GeocodingModule } from '../geocoding';

@Module({
  imports: [DatabaseModule, GeocodingModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
