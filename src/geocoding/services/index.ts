export * from './gazetteer-cache.service';
export * from './gazetteer-loader.service';
export * from './geocoding.service';
