import { Module } from '@nestjs/common';
import { AuxiliaresModule } from './auxiliares/auxiliares.module';
import { HealthModule } from './health/health.module';
import { DatabaseModule } from './database/database.module';
import { GeocodingModule } from './geocoding';
import { AnalysisModule } from './analysis/analysis.module';
import { ReportsModule } from './reports/reports.module';

@Module({
  imports: [
    DatabaseModule,
    AuxiliaresModule,
    HealthModule,
    GeocodingModule, // Gazetteer local + índice espacial (carga en segundo plano)
    AnalysisModule, // Pipeline de análisis de rides
    ReportsModule, // API de reportes históricos
  ],
})
export class AppModule {}
