export * from '../index.js';
export { FileRandomAccess } from './zip/RandomAccess.js';
export { FileSink, NodeWritableSink } from './zip/Sink.js';
