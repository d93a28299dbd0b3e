/**
 * Ledger identity: a 20-byte hex address. Values crossing the engine boundary
 * are normalized to their checksummed form.
 */
export type Identity = string;

/**
 * Asset handle. The zero address names the native asset.
 */
export type AssetHandle = string;
