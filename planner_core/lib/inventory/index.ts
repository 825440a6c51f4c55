export { parseFeedSnapshot, parseInventory } from './parseInventory';
export type { FeedSnapshot } from './parseInventory';
export { AssetSchema, FeedSnapshotSchema, InventorySchema } from './schemas';
export { InvalidInventoryError } from './errors';
export type { InvalidInventoryErrorCode } from './errors';
