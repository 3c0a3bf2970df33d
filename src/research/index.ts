export * from './researcher.js';
