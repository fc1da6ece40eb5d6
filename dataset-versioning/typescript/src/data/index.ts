export * from './dvc.js';
