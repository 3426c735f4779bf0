import { and, asc, eq, inArray, lt } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { TransferState } from '@consent-gateway/shared/constants/transfer.constants.js';
import {
  gatewayDataTransfers,
  type SelectDataTransfer,
} from '@consent-gateway/shared/schemas/db/gateway.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TransferUpdate = Partial<
  Pick<
    SelectDataTransfer,
    | 'state'
    | 'failureReason'
    | 'payload'
    | 'forwardAttempts'
    | 'deadlineAt'
    | 'deliveredAt'
    | 'acknowledgedAt'
  >
> & { updatedAt: Date };

const AWAITING_DELIVERY: TransferState[] = [TransferState.PENDING, TransferState.FORWARDED];

export interface TransferRepository {
  findById(transferId: string): Promise<SelectDataTransfer | null>;
  insert(job: SelectDataTransfer): Promise<SelectDataTransfer>;
  update(transferId: string, patch: TransferUpdate): Promise<SelectDataTransfer | null>;
  /** FORWARDED jobs whose delivery deadline lies before `now`. */
  listForwardedPastDeadline(now: Date): Promise<SelectDataTransfer[]>;
  /** PENDING or FORWARDED jobs, still waiting for the HIP's delivery. */
  listAwaitingDelivery(): Promise<SelectDataTransfer[]>;
  listByHiu(hiuId: string): Promise<SelectDataTransfer[]>;
}

// ---------------------------------------------------------------------------
// Drizzle implementation
// ---------------------------------------------------------------------------

export function createTransferRepository(db: NodePgDatabase): TransferRepository {
  return {
    async findById(transferId) {
      const rows = await db
        .select()
        .from(gatewayDataTransfers)
        .where(eq(gatewayDataTransfers.transferId, transferId))
        .limit(1);
      return rows[0] ?? null;
    },

    async insert(job) {
      const rows = await db.insert(gatewayDataTransfers).values(job).returning();
      return rows[0];
    },

    async update(transferId, patch) {
      const rows = await db
        .update(gatewayDataTransfers)
        .set(patch)
        .where(eq(gatewayDataTransfers.transferId, transferId))
        .returning();
      return rows[0] ?? null;
    },

    async listForwardedPastDeadline(now) {
      return db
        .select()
        .from(gatewayDataTransfers)
        .where(
          and(
            eq(gatewayDataTransfers.state, TransferState.FORWARDED),
            lt(gatewayDataTransfers.deadlineAt, now),
          ),
        );
    },

    async listAwaitingDelivery() {
      return db
        .select()
        .from(gatewayDataTransfers)
        .where(inArray(gatewayDataTransfers.state, AWAITING_DELIVERY));
    },

    async listByHiu(hiuId) {
      return db
        .select()
        .from(gatewayDataTransfers)
        .where(eq(gatewayDataTransfers.hiuId, hiuId))
        .orderBy(asc(gatewayDataTransfers.createdAt));
    },
  };
}

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

function copy(row: SelectDataTransfer): SelectDataTransfer {
  return { ...row, recordTypes: [...row.recordTypes] };
}

export function createInMemoryTransferRepository(): TransferRepository {
  const rows = new Map<string, SelectDataTransfer>();

  return {
    async findById(transferId) {
      const row = rows.get(transferId);
      return row ? copy(row) : null;
    },

    async insert(job) {
      rows.set(job.transferId, copy(job));
      return copy(job);
    },

    async update(transferId, patch) {
      const existing = rows.get(transferId);
      if (!existing) return null;
      const next = { ...existing, ...patch };
      rows.set(transferId, next);
      return copy(next);
    },

    async listForwardedPastDeadline(now) {
      return [...rows.values()]
        .filter(
          (r) =>
            r.state === TransferState.FORWARDED &&
            r.deadlineAt !== null &&
            r.deadlineAt.getTime() < now.getTime(),
        )
        .map(copy);
    },

    async listAwaitingDelivery() {
      return [...rows.values()]
        .filter((r) => AWAITING_DELIVERY.includes(r.state))
        .map(copy);
    },

    async listByHiu(hiuId) {
      return [...rows.values()]
        .filter((r) => r.hiuId === hiuId)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
        .map(copy);
    },
  };
}
