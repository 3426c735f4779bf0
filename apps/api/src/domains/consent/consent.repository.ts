import { and, asc, eq, lt } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { ConsentStatus } from '@consent-gateway/shared/constants/consent.constants.js';
import {
  gatewayConsentArtefacts,
  type SelectConsentArtefact,
} from '@consent-gateway/shared/schemas/db/gateway.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

// dateFrom, dateTo and recordTypes are absent on purpose: they never change
// after creation.
export type ConsentUpdate = Partial<
  Pick<SelectConsentArtefact, 'status' | 'grantedAt' | 'validUntil' | 'revokedAt'>
> & { updatedAt: Date };

export interface ConsentRepository {
  findById(consentId: string): Promise<SelectConsentArtefact | null>;
  insert(artefact: SelectConsentArtefact): Promise<SelectConsentArtefact>;
  update(consentId: string, patch: ConsentUpdate): Promise<SelectConsentArtefact | null>;
  /** GRANTED artefacts whose validUntil lies before `now`. */
  listGrantedExpiredBefore(now: Date): Promise<SelectConsentArtefact[]>;
  /** REQUESTED artefacts, still waiting for the patient's decision. */
  listAwaitingDecision(): Promise<SelectConsentArtefact[]>;
  listByPatient(patientId: string): Promise<SelectConsentArtefact[]>;
}

// ---------------------------------------------------------------------------
// Drizzle implementation
// ---------------------------------------------------------------------------

export function createConsentRepository(db: NodePgDatabase): ConsentRepository {
  return {
    async findById(consentId) {
      const rows = await db
        .select()
        .from(gatewayConsentArtefacts)
        .where(eq(gatewayConsentArtefacts.consentId, consentId))
        .limit(1);
      return rows[0] ?? null;
    },

    async insert(artefact) {
      const rows = await db.insert(gatewayConsentArtefacts).values(artefact).returning();
      return rows[0];
    },

    async update(consentId, patch) {
      const rows = await db
        .update(gatewayConsentArtefacts)
        .set(patch)
        .where(eq(gatewayConsentArtefacts.consentId, consentId))
        .returning();
      return rows[0] ?? null;
    },

    async listGrantedExpiredBefore(now) {
      return db
        .select()
        .from(gatewayConsentArtefacts)
        .where(
          and(
            eq(gatewayConsentArtefacts.status, ConsentStatus.GRANTED),
            lt(gatewayConsentArtefacts.validUntil, now),
          ),
        );
    },

    async listAwaitingDecision() {
      return db
        .select()
        .from(gatewayConsentArtefacts)
        .where(eq(gatewayConsentArtefacts.status, ConsentStatus.REQUESTED));
    },

    async listByPatient(patientId) {
      return db
        .select()
        .from(gatewayConsentArtefacts)
        .where(eq(gatewayConsentArtefacts.patientId, patientId))
        .orderBy(asc(gatewayConsentArtefacts.createdAt));
    },
  };
}

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

function copy(row: SelectConsentArtefact): SelectConsentArtefact {
  return { ...row, recordTypes: [...row.recordTypes] };
}

export function createInMemoryConsentRepository(): ConsentRepository {
  const rows = new Map<string, SelectConsentArtefact>();

  return {
    async findById(consentId) {
      const row = rows.get(consentId);
      return row ? copy(row) : null;
    },

    async insert(artefact) {
      rows.set(artefact.consentId, copy(artefact));
      return copy(artefact);
    },

    async update(consentId, patch) {
      const existing = rows.get(consentId);
      if (!existing) return null;
      const next = { ...existing, ...patch };
      rows.set(consentId, next);
      return copy(next);
    },

    async listGrantedExpiredBefore(now) {
      return [...rows.values()]
        .filter(
          (r) =>
            r.status === ConsentStatus.GRANTED &&
            r.validUntil !== null &&
            r.validUntil.getTime() < now.getTime(),
        )
        .map(copy);
    },

    async listAwaitingDecision() {
      return [...rows.values()].filter((r) => r.status === ConsentStatus.REQUESTED).map(copy);
    },

    async listByPatient(patientId) {
      return [...rows.values()]
        .filter((r) => r.patientId === patientId)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
        .map(copy);
    },
  };
}
