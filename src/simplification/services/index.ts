export * from './simplification.service';
