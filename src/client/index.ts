export * from './command-client.js';
