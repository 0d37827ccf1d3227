export * from './models';
export * from './services';
export * from './stages.module';
