/**
 * Extraction stage output: the candidate entity set for one document.
 *
 * Everything here is advisory. `possible_victim` is honoured by the writer
 * whether or not later stages repeat it.
 */

import { z } from 'zod';

import { DATE_PRECISIONS, DOCUMENT_TYPES } from './document.js';
import { flag, lenientArray, oneOf, optionalText, text, textList, victimFlag, victimNameList } from './lenient.js';

export const LOCATION_TYPES = [
  'private_residence',
  'island',
  'private_aircraft',
  'hotel',
  'city',
  'country',
  'other',
] as const;

export type LocationType = (typeof LOCATION_TYPES)[number];

export const EVENT_TYPES = [
  'flight',
  'property_visit',
  'meeting',
  'communication',
  'financial_transaction',
  'other',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export const PersonCandidateSchema = z.object({
  name: text(),
  name_as_written: text(),
  context: text(),
  is_redacted: flag(),
  possible_victim: victimFlag(),
});

export const LocationCandidateSchema = z.object({
  name: text(),
  location_type: oneOf(LOCATION_TYPES, 'other'),
  context: text(),
});

export const EventCandidateSchema = z.object({
  event_type: oneOf(EVENT_TYPES, 'other'),
  date: optionalText(),
  date_precision: oneOf(DATE_PRECISIONS, 'unknown'),
  persons_involved: textList(),
  location: optionalText(),
  description: text(),
});

export const ExtractionResultSchema = z.object({
  document_type: oneOf(DOCUMENT_TYPES, 'other'),
  document_date: optionalText(),
  date_precision: oneOf(DATE_PRECISIONS, 'unknown'),
  persons_found: lenientArray(PersonCandidateSchema),
  locations_found: lenientArray(LocationCandidateSchema),
  events_found: lenientArray(EventCandidateSchema),
  organizations_found: textList(),
  victim_flags: victimNameList(),
  scout_notes: text(),
  requires_human_review: flag(),
});

export type PersonCandidate = z.output<typeof PersonCandidateSchema>;
export type LocationCandidate = z.output<typeof LocationCandidateSchema>;
export type EventCandidate = z.output<typeof EventCandidateSchema>;
export type ExtractionResult = z.output<typeof ExtractionResultSchema>;

/** Keys at least one of which must be present for output to count as an extraction */
export const EXTRACTION_SIGNATURE_KEYS = ['document_type', 'persons_found', 'locations_found'] as const;
