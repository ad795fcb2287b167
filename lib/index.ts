export * from './actions';
export * from './environment-manager';
export * from './errors';
export * from './project';
export * from './rig-schema';
export * from './run-context';
export * from './state-store';
export * from './target';
export * from './target-graph';
export * from './tool-invoker';
export { SimpleError } from './util/flow';
