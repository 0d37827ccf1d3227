import { Controller, Get } from '@nestjs/common';
import { HealthService } from './health.service';

@Controller('health')
export class HealthController {
  constructor(private healthService: HealthService) {}

  @Get()
  async check() {
    return await this.healthService.check();
  }

  /**
   * Listo para analizar: base de datos conectada.
   * Incluye el estado del gazetteer a título informativo.
   */
  @Get('ready')
  ready() {
    return this.healthService.ready();
  }

  @Get('live')
  live() {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }

  /**
   * Estado de carga del gazetteer por país
   */
  @Get('geocoding')
  geocoding() {
    return this.healthService.geocodingStatus();
  }
}
