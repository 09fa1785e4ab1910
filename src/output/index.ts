export { serializeChunks, writeChunks } from './json-writer.js';
