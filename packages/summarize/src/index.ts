export * from './state.js';
export * from './prompt.js';
export * from './node.js';
export * from './summarizer.js';
