export { TreeWalker } from './tree-walker.js';
export { CollectionWalker } from './collection-walker.js';
