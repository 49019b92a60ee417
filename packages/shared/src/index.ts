export * from './nfc.js';
export * from './classifier.js';
export * from './format.js';
export * from './codec.js';
export * from './rows.js';
