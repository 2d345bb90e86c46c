export * from './shape';
export * from './number';
export * from './tensor';
