import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { GeonamesHttpService } from './http/http.service';

@Module({
  imports: [HttpModule],
  providers: [GeonamesHttpService],
  exports: [GeonamesHttpService],
})
export class AuxiliaresModule {}
