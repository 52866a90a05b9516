export * from './analysis';
export * from './hub-node-analysis';
export * from './node-referenced-analysis';
export * from './category-color-analysis';
