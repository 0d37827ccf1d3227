import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, Between } from 'typeorm';
import { Ride } from '../entities/ride.entity';
import { RideStage } from '../entities/ride-stage.entity';

export type ICreateRideData = Omit<Ride, 'created_at'>;

export type ICreateRideStageData = Omit<RideStage, 'id' | 'ride_id' | 'created_at'>;

@Injectable()
export class RideRepository {
  constructor(
    @InjectRepository(Ride)
    private readonly rideRepo: Repository<Ride>,
  ) {}

  /**
   * Guarda el ride y sus stages en una sola transacción
   */
  async saveAnalysis(
    ride: ICreateRideData,
    stages: ICreateRideStageData[],
  ): Promise<Ride> {
    return await this.rideRepo.manager.transaction(async (manager) => {
      const saved = await manager.save(Ride, manager.create(Ride, ride));

      if (stages.length > 0) {
        await manager.save(
          RideStage,
          stages.map((stage) => manager.create(RideStage, { ...stage, ride_id: saved.id })),
        );
      }

      return saved;
    });
  }

  async findById(id: string): Promise<Ride | null> {
    return await this.rideRepo.findOne({ where: { id } });
  }

  async findByTimeRange(
    startTime: Date,
    endTime: Date,
    limit?: number,
  ): Promise<Ride[]> {
    return await this.rideRepo.find({
      where: { start_time: Between(startTime, endTime) },
      order: { start_time: 'DESC' },
      take: limit,
    });
  }

  /**
   * Elimina un ride y sus stages
   * @returns true si se eliminó, false si no existía
   */
  async deleteById(id: string): Promise<boolean> {
    return await this.rideRepo.manager.transaction(async (manager) => {
      await manager.delete(RideStage, { ride_id: id });
      const result = await manager.delete(Ride, { id });
      return (result.affected || 0) > 0;
    });
  }
}
