export * from './paper';
export * from './search';
export * from './task';
