export * from './track.model';
