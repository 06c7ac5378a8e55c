export type { PageFetchers } from './iterator.js';
export { DEFAULT_PAGE_SIZE, PageIterator } from './iterator.js';
