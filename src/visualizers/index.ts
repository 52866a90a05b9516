export * from './types-visualizer';
