export * from './osint.js';
