export { GlobFilter, filterWithGlob } from './glob-filter.js';
