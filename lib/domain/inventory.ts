import type { ReconcileErrorCode } from "@/lib/domain/errors";
import type { FieldOpsStore } from "@/lib/domain/store/types";
import type { InventoryItem } from "@/types/domain";

export const DEFAULT_INVENTORY_UNIT = "piece";

export function effectiveThreshold(item: Pick<InventoryItem, "low_stock_threshold">, fallback: number) {
  return item.low_stock_threshold ?? fallback;
}

export function isLowStock(
  item: Pick<InventoryItem, "quantity" | "low_stock_threshold">,
  fallbackThreshold: number,
) {
  return item.quantity <= effectiveThreshold(item, fallbackThreshold);
}

export type InventoryAdjustmentResult =
  | { ok: true; item: InventoryItem; before: number; after: number }
  | { ok: false; code: ReconcileErrorCode; message: string };

type AdjustOptions = {
  maxAttempts: number;
  now: string;
};

/**
 * Applies `delta` with compare-and-swap on the quantity, re-reading the row after each lost race. A result
 * below zero is refused without writing, so a concurrent consumer can turn a retry into InsufficientStock.
 */
export async function adjustInventoryQuantity(
  store: FieldOpsStore,
  item: InventoryItem,
  delta: number,
  { maxAttempts, now }: AdjustOptions,
): Promise<InventoryAdjustmentResult> {
  let current: InventoryItem | null = item;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    if (!current) {
      return { ok: false, code: "UnresolvedReference", message: `Inventory item ${item.id} no longer exists` };
    }

    const next = current.quantity + delta;
    if (next < 0) {
      return {
        ok: false,
        code: "InsufficientStock",
        message: `Only ${current.quantity} ${current.unit} of ${current.name} on hand; cannot remove ${Math.abs(delta)}`,
      };
    }

    const updated = await store.compareAndSetQuantity(current.id, current.quantity, next, now);
    if (updated) {
      return { ok: true, item: updated, before: current.quantity, after: updated.quantity };
    }

    console.warn("[inventory] Quantity changed underneath adjustment; retrying", {
      itemId: item.id,
      attempt,
      maxAttempts,
    });
    current = await store.getInventoryItem(item.id);
  }

  return {
    ok: false,
    code: "ConcurrentUpdateConflict",
    message: `Quantity of ${item.name} kept changing; gave up after ${maxAttempts} attempts`,
  };
}
