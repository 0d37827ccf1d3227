import { Module } from '@nestjs/common';
import { SimplificationService } from './services';

@Module({
  providers: [SimplificationService],
  exports: [SimplificationService],
})
export class SimplificationModule {}
