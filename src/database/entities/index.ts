export * from './ride.entity';
export * from './ride-stage.entity';
