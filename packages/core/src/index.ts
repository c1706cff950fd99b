export * from './errors';
export * from './shape';
export * from './indexing';
export * from './buffer';
export * from './layout';
export * from './ndarray';
export * from './sequence';
