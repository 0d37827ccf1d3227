export * from './ride.repository';
export * from './ride-stage.repository';
