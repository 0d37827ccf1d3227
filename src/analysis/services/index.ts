export * from './ride-persistence.service';
