import { and, eq, inArray, lt } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { LinkState } from '@consent-gateway/shared/constants/link.constants.js';
import {
  gatewayLinkRequests,
  gatewayCareContextLinks,
  type SelectLinkRequest,
  type SelectCareContextLink,
} from '@consent-gateway/shared/schemas/db/gateway.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LinkRequestUpdate = Partial<
  Pick<
    SelectLinkRequest,
    'state' | 'otpAttempts' | 'otpHash' | 'candidateCareContexts' | 'failureReason' | 'expiresAt'
  >
> & { updatedAt: Date };

const OPEN_STATES = [LinkState.INITIATED, LinkState.OTP_SENT];

export interface LinkRepository {
  findById(requestId: string): Promise<SelectLinkRequest | null>;
  insert(request: SelectLinkRequest): Promise<SelectLinkRequest>;
  update(requestId: string, patch: LinkRequestUpdate): Promise<SelectLinkRequest | null>;
  /** Requests still INITIATED or OTP_SENT whose expiresAt lies before `now`. */
  listOpenExpiredBefore(now: Date): Promise<SelectLinkRequest[]>;
  /** INITIATED requests, still waiting for the HIP's discovery result. */
  listAwaitingDiscovery(): Promise<SelectLinkRequest[]>;

  findLink(patientId: string, hipId: string): Promise<SelectCareContextLink | null>;
  /**
   * Add care context ids to the (patient, HIP) link, creating it if absent.
   * Existing ids are kept; the result is the union.
   */
  appendCareContexts(
    patientId: string,
    hipId: string,
    careContextIds: readonly string[],
    at: Date,
  ): Promise<SelectCareContextLink>;
  listLinksByPatient(patientId: string): Promise<SelectCareContextLink[]>;
}

function union(existing: readonly string[], added: readonly string[]): string[] {
  return [...new Set([...existing, ...added])];
}

// ---------------------------------------------------------------------------
// Drizzle implementation
// ---------------------------------------------------------------------------

export function createLinkRepository(db: NodePgDatabase): LinkRepository {
  return {
    async findById(requestId) {
      const rows = await db
        .select()
        .from(gatewayLinkRequests)
        .where(eq(gatewayLinkRequests.requestId, requestId))
        .limit(1);
      return rows[0] ?? null;
    },

    async insert(request) {
      const rows = await db.insert(gatewayLinkRequests).values(request).returning();
      return rows[0];
    },

    async update(requestId, patch) {
      const rows = await db
        .update(gatewayLinkRequests)
        .set(patch)
        .where(eq(gatewayLinkRequests.requestId, requestId))
        .returning();
      return rows[0] ?? null;
    },

    async listOpenExpiredBefore(now) {
      return db
        .select()
        .from(gatewayLinkRequests)
        .where(
          and(
            inArray(gatewayLinkRequests.state, OPEN_STATES),
            lt(gatewayLinkRequests.expiresAt, now),
          ),
        );
    },

    async listAwaitingDiscovery() {
      return db
        .select()
        .from(gatewayLinkRequests)
        .where(eq(gatewayLinkRequests.state, LinkState.INITIATED));
    },

    async findLink(patientId, hipId) {
      const rows = await db
        .select()
        .from(gatewayCareContextLinks)
        .where(
          and(
            eq(gatewayCareContextLinks.patientId, patientId),
            eq(gatewayCareContextLinks.hipId, hipId),
          ),
        )
        .limit(1);
      return rows[0] ?? null;
    },

    async appendCareContexts(patientId, hipId, careContextIds, at) {
      return db.transaction(async (tx) => {
        const existing = await tx
          .select()
          .from(gatewayCareContextLinks)
          .where(
            and(
              eq(gatewayCareContextLinks.patientId, patientId),
              eq(gatewayCareContextLinks.hipId, hipId),
            ),
          )
          .for('update');

        const merged = union(existing[0]?.careContextIds ?? [], careContextIds);

        const rows = await tx
          .insert(gatewayCareContextLinks)
          .values({ patientId, hipId, careContextIds: merged, createdAt: at, updatedAt: at })
          .onConflictDoUpdate({
            target: [gatewayCareContextLinks.patientId, gatewayCareContextLinks.hipId],
            set: { careContextIds: merged, updatedAt: at },
          })
          .returning();
        return rows[0];
      });
    },

    async listLinksByPatient(patientId) {
      return db
        .select()
        .from(gatewayCareContextLinks)
        .where(eq(gatewayCareContextLinks.patientId, patientId))
        .orderBy(gatewayCareContextLinks.hipId);
    },
  };
}

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

function copyRequest(row: SelectLinkRequest): SelectLinkRequest {
  return { ...row, candidateCareContexts: row.candidateCareContexts.map((c) => ({ ...c })) };
}

function copyLink(row: SelectCareContextLink): SelectCareContextLink {
  return { ...row, careContextIds: [...row.careContextIds] };
}

export function createInMemoryLinkRepository(): LinkRepository {
  const requests = new Map<string, SelectLinkRequest>();
  const links = new Map<string, SelectCareContextLink>();
  const linkKey = (patientId: string, hipId: string) => `${patientId}\u0000${hipId}`;

  return {
    async findById(requestId) {
      const row = requests.get(requestId);
      return row ? copyRequest(row) : null;
    },

    async insert(request) {
      requests.set(request.requestId, copyRequest(request));
      return copyRequest(request);
    },

    async update(requestId, patch) {
      const existing = requests.get(requestId);
      if (!existing) return null;
      const next = copyRequest({ ...existing, ...patch });
      requests.set(requestId, next);
      return copyRequest(next);
    },

    async listOpenExpiredBefore(now) {
      return [...requests.values()]
        .filter(
          (r) =>
            (r.state === LinkState.INITIATED || r.state === LinkState.OTP_SENT) &&
            r.expiresAt.getTime() < now.getTime(),
        )
        .map(copyRequest);
    },

    async listAwaitingDiscovery() {
      return [...requests.values()]
        .filter((r) => r.state === LinkState.INITIATED)
        .map(copyRequest);
    },

    async findLink(patientId, hipId) {
      const row = links.get(linkKey(patientId, hipId));
      return row ? copyLink(row) : null;
    },

    async appendCareContexts(patientId, hipId, careContextIds, at) {
      const key = linkKey(patientId, hipId);
      const existing = links.get(key);
      const next: SelectCareContextLink = existing
        ? { ...existing, careContextIds: union(existing.careContextIds, careContextIds), updatedAt: at }
        : { patientId, hipId, careContextIds: union([], careContextIds), createdAt: at, updatedAt: at };
      links.set(key, next);
      return copyLink(next);
    },

    async listLinksByPatient(patientId) {
      return [...links.values()]
        .filter((l) => l.patientId === patientId)
        .sort((a, b) => a.hipId.localeCompare(b.hipId))
        .map(copyLink);
    },
  };
}
