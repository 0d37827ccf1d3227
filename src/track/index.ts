export * from './models';
export * from './utils/track.utils';
