export * from './state-machine.service';
export * from './stage-detector.service';
export * from './stage-summary.service';
