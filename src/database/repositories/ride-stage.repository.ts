import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { RideStage } from '../entities/ride-stage.entity';

@Injectable()
export class RideStageRepository {
  constructor(
    @InjectRepository(RideStage)
    private readonly stageRepo: Repository<RideStage>,
  ) {}

  async findByRide(rideId: string, stageType?: string): Promise<RideStage[]> {
    const where: FindOptionsWhere<RideStage> = { ride_id: rideId };

    if (stageType) {
      where.stage_type = stageType;
    }

    return await this.stageRepo.find({
      where,
      order: { sequence: 'ASC' },
    });
  }
}
