export * from './Chunk.js';
export type * from './PageModel.js';
export * from './Section.js';
