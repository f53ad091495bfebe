export { renderStatusBlock, STATUS_MARKER, CALLOUT_PREFIX } from './status-block.js';
export { patchDocument, findStatusBlocks, type PatchResult, type BlockRegion } from './patcher.js';
export { StatusDocument, type DocumentUpdate } from './readme.js';
