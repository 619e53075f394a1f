export * from './constants';
export * from './errors';
export * from './profiles';
export * from './estimate';
export * from './format';
export { loadDefaults, CliDefaults } from './config';
export { run, createProgram, Output } from './cli';
