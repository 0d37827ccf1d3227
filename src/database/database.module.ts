import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  DB_HOST,
  DB_PORT,
  DB_USERNAME,
  DB_PASSWORD,
  DB_DATABASE,
  DB_LOGGING,
} from '../env';
import { Ride, RideStage } from './entities';
import { RideRepository, RideStageRepository } from './repositories';

@Module({
  imports: [
    TypeOrmModule.forRoot({
      type: 'postgres',
      host: DB_HOST,
      port: DB_PORT,
      username: DB_USERNAME,
      password: DB_PASSWORD,
      database: DB_DATABASE,
      entities: [Ride, RideStage],
      synchronize: true, // TypeORM auto-crea/actualiza tablas
      logging: DB_LOGGING,
      extra: {
        max: 20, // pool size máximo
        connectionTimeoutMillis: 5000,
        idleTimeoutMillis: 30000,
      },
    }),
    TypeOrmModule.forFeature([Ride, RideStage]),
  ],
  providers: [RideRepository, RideStageRepository],
  exports: [TypeOrmModule, RideRepository, RideStageRepository],
})
export class DatabaseModule {}
