export * from './stage.model';
export * from './segmentation-state.model';
