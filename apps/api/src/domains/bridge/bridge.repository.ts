import { eq } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  gatewayBridges,
  type SelectBridge,
} from '@consent-gateway/shared/schemas/db/gateway.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BridgeUpdate = Partial<Pick<SelectBridge, 'callbackUrl' | 'status'>> & {
  updatedAt: Date;
};

export interface BridgeRepository {
  findById(bridgeId: string): Promise<SelectBridge | null>;
  /** Returns null when a bridge with the same id already exists. */
  insert(bridge: SelectBridge): Promise<SelectBridge | null>;
  update(bridgeId: string, patch: BridgeUpdate): Promise<SelectBridge | null>;
}

// ---------------------------------------------------------------------------
// Drizzle implementation
// ---------------------------------------------------------------------------

export function createBridgeRepository(db: NodePgDatabase): BridgeRepository {
  return {
    async findById(bridgeId) {
      const rows = await db
        .select()
        .from(gatewayBridges)
        .where(eq(gatewayBridges.bridgeId, bridgeId))
        .limit(1);

      return rows[0] ?? null;
    },

    async insert(bridge) {
      const rows = await db
        .insert(gatewayBridges)
        .values(bridge)
        .onConflictDoNothing({ target: gatewayBridges.bridgeId })
        .returning();

      return rows[0] ?? null;
    },

    async update(bridgeId, patch) {
      const rows = await db
        .update(gatewayBridges)
        .set(patch)
        .where(eq(gatewayBridges.bridgeId, bridgeId))
        .returning();

      return rows[0] ?? null;
    },
  };
}

// ---------------------------------------------------------------------------
// In-memory implementation (no DATABASE_URL, and tests)
// ---------------------------------------------------------------------------

export function createInMemoryBridgeRepository(): BridgeRepository {
  const rows = new Map<string, SelectBridge>();

  return {
    async findById(bridgeId) {
      const row = rows.get(bridgeId);
      return row ? { ...row, registeredServices: [...row.registeredServices] } : null;
    },

    async insert(bridge) {
      if (rows.has(bridge.bridgeId)) return null;
      rows.set(bridge.bridgeId, { ...bridge, registeredServices: [...bridge.registeredServices] });
      return { ...bridge };
    },

    async update(bridgeId, patch) {
      const existing = rows.get(bridgeId);
      if (!existing) return null;
      const next = { ...existing, ...patch };
      rows.set(bridgeId, next);
      return { ...next };
    },
  };
}
