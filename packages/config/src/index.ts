export * from './configuration';
export * from './consistency';
export * from './credentials';
export * from './deprecations';
export * from './directories';
export * from './exchange';
export * from './loader';
export * from './merge';
export * from './overrides';
export * from './pairs';
export * from './schema';
export * from './tree';
export * from './validator';
