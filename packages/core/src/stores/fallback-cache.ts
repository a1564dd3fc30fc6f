/**
 * Fallback Cache
 * @module @kuberoute/core/stores/fallback-cache
 *
 * Single-slot store of the last successfully reconciled pass. Written by the
 * success path of the cycle, read by its fallback path. Every read and write
 * is one synchronous step on the event loop, so overlapping cycles never
 * observe a half-written slot; the last write wins.
 */

import { shallowRef, computed, type ComputedRef, type ShallowRef } from '@vue/reactivity';
import type { ReconciliationSnapshot } from '@kuberoute/shared';

export class FallbackCache {
  private readonly slot: ShallowRef<ReconciliationSnapshot | null> = shallowRef(null);

  /**
   * Whether a pass has been cached
   */
  readonly hasSnapshot: ComputedRef<boolean> = computed(() => this.slot.value !== null);

  /**
   * When the cached pass was observed
   */
  readonly observedAt: ComputedRef<Date | null> = computed(() =>
    this.slot.value ? new Date(this.slot.value.observedAt) : null,
  );

  /**
   * Copy of the cached pass, or null when nothing was cached yet
   */
  read(): ReconciliationSnapshot | null {
    const snapshot = this.slot.value;
    return snapshot ? structuredClone(snapshot) : null;
  }

  /**
   * Overwrite the slot with a copy of `snapshot`
   */
  replace(snapshot: ReconciliationSnapshot): void {
    this.slot.value = structuredClone(snapshot);
  }

  clear(): void {
    this.slot.value = null;
  }
}

/**
 * Create an empty fallback cache
 */
export function createFallbackCache(): FallbackCache {
  return new FallbackCache();
}
