/**
 * Verification stage output. Confidence here is the system of record.
 */

import { z } from 'zod';

import { CONFIDENCE_LEVELS } from './confidence.js';
import { DATE_PRECISIONS } from './document.js';
import { EVENT_TYPES, LOCATION_TYPES } from './extraction.js';
import { flag, lenientArray, oneOf, optionalText, text, textList, victimFlag } from './lenient.js';

export const OCR_RELIABILITIES = ['reliable', 'questionable', 'unreliable'] as const;

export type OcrReliability = (typeof OCR_RELIABILITIES)[number];

export const CONFLICT_TYPES = ['date', 'person', 'location', 'other'] as const;

export type ConflictType = (typeof CONFLICT_TYPES)[number];

const confidence = () => oneOf(CONFIDENCE_LEVELS, 'unverified');

export const VerifiedPersonSchema = z.object({
  name: text(),
  confidence: confidence(),
  verification_notes: text(),
  upgrade_gap: optionalText(),
  is_redacted: flag(),
  name_recovered: flag(),
  possible_victim: victimFlag(),
});

export const VerifiedLocationSchema = z.object({
  name: text(),
  location_type: oneOf(LOCATION_TYPES, 'other'),
  confidence: confidence(),
  verification_notes: text(),
});

export const VerifiedEventSchema = z.object({
  event_type: oneOf(EVENT_TYPES, 'other'),
  date: optionalText(),
  date_precision: oneOf(DATE_PRECISIONS, 'unknown'),
  confidence: confidence(),
  persons_present: textList(),
  location: optionalText(),
  description: text(),
  upgrade_gap: optionalText(),
  verification_notes: text(),
});

export const ConflictSchema = z.object({
  conflict_type: oneOf(CONFLICT_TYPES, 'other'),
  field: optionalText(),
  description: text(),
  document_claim: text(),
  conflicting_claim: text(),
});

export const FlightDetailsSchema = z
  .object({
    flight_date: optionalText(),
    origin: optionalText(),
    destination: optionalText(),
    aircraft: optionalText(),
    passenger_count: z.number().int().nonnegative().nullable().catch(null),
  })
  .nullable()
  .catch(null);

export const VerificationResultSchema = z.object({
  verification_summary: text(),
  document_confidence: confidence(),
  ocr_reliability: oneOf(OCR_RELIABILITIES, 'questionable'),
  verified_persons: lenientArray(VerifiedPersonSchema),
  verified_locations: lenientArray(VerifiedLocationSchema),
  verified_events: lenientArray(VerifiedEventSchema),
  flight_details: FlightDetailsSchema,
  conflicts_detected: lenientArray(ConflictSchema),
  anomalies: textList(),
  requires_human_review: flag(),
  human_review_reason: optionalText(),
});

export type VerifiedPerson = z.output<typeof VerifiedPersonSchema>;
export type VerifiedLocation = z.output<typeof VerifiedLocationSchema>;
export type VerifiedEvent = z.output<typeof VerifiedEventSchema>;
export type DetectedConflict = z.output<typeof ConflictSchema>;
export type FlightDetails = z.output<typeof FlightDetailsSchema>;
export type VerificationResult = z.output<typeof VerificationResultSchema>;

export const VERIFICATION_SIGNATURE_KEYS = [
  'document_confidence',
  'verified_persons',
  'verified_locations',
] as const;
