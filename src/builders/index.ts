export * from './source-type';
export * from './element-builder';
export * from './node-builder';
export * from './link-builder';
export * from './category-builder';
export * from './style-builder';
export * from './builder-registry';
