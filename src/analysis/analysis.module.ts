import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { GeocodingModule } from '../geocoding';
import { SimplificationModule } from '../simplification/simplification.module';
import { StagesModule } from '../stages/stages.module';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { RidePersistenceService } from './services';

@Module({
  imports: [DatabaseModule, GeocodingModule, SimplificationModule, StagesModule],
  controllers: [AnalysisController],
  providers: [AnalysisService, RidePersistenceService],
  exports: [AnalysisService],
})
export class AnalysisModule {}
