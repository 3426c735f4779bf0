// ============================================================================
// Gateway — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  timestamp,
  jsonb,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

import type {
  BridgeRole,
  BridgeStatus,
  BridgeService,
} from '../../constants/bridge.constants.js';
import type { LinkState, LinkFailureReason } from '../../constants/link.constants.js';
import type { ConsentStatus, RecordType } from '../../constants/consent.constants.js';
import type {
  TransferState,
  TransferFailureReason,
} from '../../constants/transfer.constants.js';

// --- Bridges Table ---
// Registered HIP/HIU endpoints. Rows are never deleted; suspension is a
// status change. callback_url is the only mutable attribute besides status.

export const gatewayBridges = pgTable(
  'gateway_bridges',
  {
    bridgeId: varchar('bridge_id', { length: 100 }).primaryKey(),
    role: varchar('role', { length: 10 }).$type<BridgeRole>().notNull(),
    callbackUrl: varchar('callback_url', { length: 500 }).notNull(),
    registeredServices: jsonb('registered_services')
      .$type<BridgeService[]>()
      .notNull()
      .default([]),
    status: varchar('status', { length: 20 })
      .$type<BridgeStatus>()
      .notNull()
      .default('ACTIVE'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('gateway_bridges_role_status_idx').on(table.role, table.status)],
);

// --- Link Requests Table ---
// One row per discovery/link attempt. otp_hash is SHA-256 of the OTP; the
// plaintext OTP is never stored.

export interface CandidateCareContext {
  referenceNumber: string;
  display?: string;
}

export const gatewayLinkRequests = pgTable(
  'gateway_link_requests',
  {
    requestId: uuid('request_id').primaryKey(),
    patientRef: varchar('patient_ref', { length: 200 }).notNull(),
    hipId: varchar('hip_id', { length: 100 })
      .notNull()
      .references(() => gatewayBridges.bridgeId),
    state: varchar('state', { length: 20 }).$type<LinkState>().notNull(),
    otpAttempts: integer('otp_attempts').notNull().default(0),
    otpHash: varchar('otp_hash', { length: 64 }),
    candidateCareContexts: jsonb('candidate_care_contexts')
      .$type<CandidateCareContext[]>()
      .notNull()
      .default([]),
    failureReason: varchar('failure_reason', { length: 40 }).$type<LinkFailureReason>(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    // Sweep: open requests past their deadline
    index('gateway_link_requests_state_expires_idx').on(table.state, table.expiresAt),
  ],
);

// --- Care Context Links Table ---
// One row per (patient, HIP). care_context_ids only ever grows.

export const gatewayCareContextLinks = pgTable(
  'gateway_care_context_links',
  {
    patientId: varchar('patient_id', { length: 200 }).notNull(),
    hipId: varchar('hip_id', { length: 100 })
      .notNull()
      .references(() => gatewayBridges.bridgeId),
    careContextIds: jsonb('care_context_ids').$type<string[]>().notNull().default([]),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.patientId, table.hipId] })],
);

// --- Consent Artefacts Table ---
// date_from/date_to and record_types are written once at creation.
// Only status, granted_at, valid_until and revoked_at change afterwards.

export const gatewayConsentArtefacts = pgTable(
  'gateway_consent_artefacts',
  {
    consentId: uuid('consent_id').primaryKey(),
    patientId: varchar('patient_id', { length: 200 }).notNull(),
    hiuId: varchar('hiu_id', { length: 100 })
      .notNull()
      .references(() => gatewayBridges.bridgeId),
    hipId: varchar('hip_id', { length: 100 })
      .notNull()
      .references(() => gatewayBridges.bridgeId),
    dateFrom: timestamp('date_from', { withTimezone: true }).notNull(),
    dateTo: timestamp('date_to', { withTimezone: true }).notNull(),
    recordTypes: jsonb('record_types').$type<RecordType[]>().notNull(),
    status: varchar('status', { length: 20 }).$type<ConsentStatus>().notNull(),
    grantedAt: timestamp('granted_at', { withTimezone: true }),
    validUntil: timestamp('valid_until', { withTimezone: true }),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('gateway_consent_artefacts_patient_idx').on(table.patientId),
    index('gateway_consent_artefacts_status_valid_idx').on(
      table.status,
      table.validUntil,
    ),
  ],
);

// --- Data Transfers Table ---
// payload is base64 of the opaque bytes the HIP delivered; null until
// DELIVERED and cleared again on acknowledgement.

export const gatewayDataTransfers = pgTable(
  'gateway_data_transfers',
  {
    transferId: uuid('transfer_id').primaryKey(),
    consentId: uuid('consent_id')
      .notNull()
      .references(() => gatewayConsentArtefacts.consentId),
    hipId: varchar('hip_id', { length: 100 }).notNull(),
    hiuId: varchar('hiu_id', { length: 100 }).notNull(),
    patientId: varchar('patient_id', { length: 200 }).notNull(),
    recordTypes: jsonb('record_types').$type<RecordType[]>().notNull(),
    windowFrom: timestamp('window_from', { withTimezone: true }).notNull(),
    windowTo: timestamp('window_to', { withTimezone: true }).notNull(),
    state: varchar('state', { length: 20 }).$type<TransferState>().notNull(),
    failureReason: varchar('failure_reason', { length: 40 }).$type<TransferFailureReason>(),
    payload: text('payload'),
    forwardAttempts: integer('forward_attempts').notNull().default(0),
    deadlineAt: timestamp('deadline_at', { withTimezone: true }),
    deliveredAt: timestamp('delivered_at', { withTimezone: true }),
    acknowledgedAt: timestamp('acknowledged_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('gateway_data_transfers_hiu_idx').on(table.hiuId),
    // Sweep: forwarded jobs past their delivery deadline
    index('gateway_data_transfers_state_deadline_idx').on(
      table.state,
      table.deadlineAt,
    ),
  ],
);

// --- Inferred Types ---

export type InsertBridge = typeof gatewayBridges.$inferInsert;
export type SelectBridge = typeof gatewayBridges.$inferSelect;

export type InsertLinkRequest = typeof gatewayLinkRequests.$inferInsert;
export type SelectLinkRequest = typeof gatewayLinkRequests.$inferSelect;

export type InsertCareContextLink = typeof gatewayCareContextLinks.$inferInsert;
export type SelectCareContextLink = typeof gatewayCareContextLinks.$inferSelect;

export type InsertConsentArtefact = typeof gatewayConsentArtefacts.$inferInsert;
export type SelectConsentArtefact = typeof gatewayConsentArtefacts.$inferSelect;

export type InsertDataTransfer = typeof gatewayDataTransfers.$inferInsert;
export type SelectDataTransfer = typeof gatewayDataTransfers.$inferSelect;
