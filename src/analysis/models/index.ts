export * from './analysis.model';
