export * from './graph-model';
