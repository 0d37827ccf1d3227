export * from './geocoding.constants';
export * from './geocoding.module';
export * from './models';
export * from './services';
export * from './utils/spatial-index';
export * from './utils/region-names-parser';
