export * from './dgml-writer';
