export * from './isolation.js';
export * from './history-sink.js';
export * from './file-sink.js';
export * from './memory-sink.js';
export * from './trend.js';
