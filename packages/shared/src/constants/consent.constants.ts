// ============================================================================
// Consent — Constants
// ============================================================================

// --- Consent Status ---
// REQUESTED -> GRANTED -> EXPIRED | REVOKED
// REQUESTED -> DENIED

export const ConsentStatus = {
  REQUESTED: 'REQUESTED',
  GRANTED: 'GRANTED',
  DENIED: 'DENIED',
  EXPIRED: 'EXPIRED',
  REVOKED: 'REVOKED',
} as const;

export type ConsentStatus = (typeof ConsentStatus)[keyof typeof ConsentStatus];

export const CONSENT_VALID_TRANSITIONS: Readonly<
  Record<ConsentStatus, readonly ConsentStatus[]>
> = Object.freeze({
  [ConsentStatus.REQUESTED]: [ConsentStatus.GRANTED, ConsentStatus.DENIED],
  [ConsentStatus.GRANTED]: [ConsentStatus.EXPIRED, ConsentStatus.REVOKED],
  [ConsentStatus.DENIED]: [],
  [ConsentStatus.EXPIRED]: [],
  [ConsentStatus.REVOKED]: [],
});

// --- Health Information Types ---

export const RecordType = {
  PRESCRIPTION: 'PRESCRIPTION',
  DIAGNOSTIC_REPORT: 'DIAGNOSTIC_REPORT',
  OP_CONSULTATION: 'OP_CONSULTATION',
  DISCHARGE_SUMMARY: 'DISCHARGE_SUMMARY',
  IMMUNIZATION_RECORD: 'IMMUNIZATION_RECORD',
  HEALTH_DOCUMENT_RECORD: 'HEALTH_DOCUMENT_RECORD',
  WELLNESS_RECORD: 'WELLNESS_RECORD',
  LAB_REPORT: 'LAB_REPORT',
} as const;

export type RecordType = (typeof RecordType)[keyof typeof RecordType];

export const RECORD_TYPES = [
  RecordType.PRESCRIPTION,
  RecordType.DIAGNOSTIC_REPORT,
  RecordType.OP_CONSULTATION,
  RecordType.DISCHARGE_SUMMARY,
  RecordType.IMMUNIZATION_RECORD,
  RecordType.HEALTH_DOCUMENT_RECORD,
  RecordType.WELLNESS_RECORD,
  RecordType.LAB_REPORT,
] as const;
