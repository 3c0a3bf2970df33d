export * from './augmenter.js';
