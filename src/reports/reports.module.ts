import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { ReportsController } from './reports.controller';
import { ReportsService } from './reports.service';

/**
 * Módulo de reportes históricos:
 * - GET /api/reports/rides
 * - GET /api/reports/rides/:rideId
 * - GET /api/reports/rides/:rideId/stages
 */
@Module({
  imports: [DatabaseModule],
  controllers: [ReportsController],
  providers: [ReportsService],
  exports: [ReportsService],
})
export class ReportsModule {}
