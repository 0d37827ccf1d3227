import { Module } from '@nestjs/common';
import { GeocodingModule } from '../geocoding/geocoding.module';
import {
  StageDetectorService,
  StageSummaryService,
  StateMachineService,
} from './services';

@Module({
  imports: [GeocodingModule],
  providers: [StateMachineService, StageDetectorService, StageSummaryService],
  exports: [StageDetectorService, StageSummaryService],
})
export class StagesModule {}
