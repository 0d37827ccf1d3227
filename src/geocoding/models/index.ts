export * from './place.model';
