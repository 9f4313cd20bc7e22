export { InMemoryClaimToken, InMemoryPositionShareToken } from './claim-token.js';
export { InMemoryBaseAssetWrapper } from './base-asset-wrapper.js';
export type { InMemoryBaseAssetOptions } from './base-asset-wrapper.js';
