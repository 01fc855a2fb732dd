// ============================================
// Per-asset exclusive section
// ============================================

import { ReentrancyError, type AssetId } from "@idleflow/common";

/**
 * Fail-fast mutual exclusion per asset. A second mutating call on an asset
 * while the first is still in flight (including a callback re-entering from
 * a venue adapter) is rejected immediately instead of waiting.
 */
export class AssetLock {
  private holders = new Map<AssetId, string>();

  async run<T>(asset: AssetId, operation: string, fn: () => Promise<T>): Promise<T> {
    const holder = this.holders.get(asset);
    if (holder !== undefined) {
      throw new ReentrancyError(asset, operation, holder);
    }

    this.holders.set(asset, operation);
    try {
      return await fn();
    } finally {
      this.holders.delete(asset);
    }
  }

  isHeld(asset: AssetId): boolean {
    return this.holders.has(asset);
  }

  /** Operation currently holding the asset, if any */
  holder(asset: AssetId): string | undefined {
    return this.holders.get(asset);
  }
}
