export * from './types';
export * from './errors';
export * from './config';
export * from './network/tables';
export * from './network/normalize';
export * from './network/validate';
export * from './network/identifiers';
export * from './network/layout';
export * from './network/sbgn';
export * from './network/bundle';
export * from './network/pipeline';
