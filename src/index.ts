export { CircuitJobsClient } from './client';
export * from './types';
export * from './errors';
export * from './config';
export * from './logger';
export * from './engine';
export * from './api/connection';
export * from './api/job';
export * from './api/result';
export * from './api/transport';
export * from './codec/npy';
export * from './circuit/program';
export * from './circuit/blackbird';
export * from './circuit/loader';
