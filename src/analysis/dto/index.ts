export * from './analyse-ride.dto';
export * from './analysis.mapper';
