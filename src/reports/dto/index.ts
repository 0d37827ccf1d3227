export * from './query-reports.dto';
export * from './ride-response.dto';
export * from './stage-response.dto';
