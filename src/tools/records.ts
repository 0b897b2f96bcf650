/**
 * Record Query MCP Tools
 *
 * Tools: radar_review_queue, radar_person_get, radar_stats
 *
 * Read-only views over the record store. Person lookups for names on the
 * victim-protection lexicon are refused without touching the database.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/records
 */

import { z } from 'zod';

import { CONFLICT_KINDS } from '../models/index.js';
import { personNotFoundError, protectedNameError } from '../server/errors.js';
import { getPipelineConfig, requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { matchesProtectedTerm } from '../services/pipeline/index.js';
import { toNameKey } from '../utils/names.js';
import { PersonGetInput, ReviewQueueInput, StatsInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle radar_review_queue - Conflict records awaiting human review, newest first
 */
export async function handleReviewQueue(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ReviewQueueInput, params);
    const db = requireDatabase();
    const conflicts = db.listConflicts({ kind: input.kind, limit: input.limit });

    return formatResponse(
      successResult({
        kind: input.kind ?? 'all',
        count: conflicts.length,
        conflicts: conflicts.map((conflict) => {
          const document = db.getDocument(conflict.document_a_id);
          return { ...conflict, document_reference: document?.doc_reference_id ?? null };
        }),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle radar_person_get - One stored person with document and relationship counts
 */
export async function handlePersonGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PersonGetInput, params);
    if (matchesProtectedTerm(input.name, getPipelineConfig().protectedTerms)) {
      throw protectedNameError();
    }

    const db = requireDatabase();
    const person = db.getPersonByKey(toNameKey(input.name));
    if (!person) {
      throw personNotFoundError();
    }

    const relationships = db.listRelationshipsForPerson(person.id).map((relationship) => {
      const counterpartId =
        relationship.person_a_id === person.id ? relationship.person_b_id : relationship.person_a_id;
      return {
        counterpart: db.getPerson(counterpartId)?.full_name ?? null,
        relationship_type: relationship.relationship_type,
        evidence_strength: relationship.evidence_strength,
        co_occurrence_count: relationship.co_occurrence_count,
        document_count: relationship.source_document_ids.length,
      };
    });

    return formatResponse(
      successResult({
        person,
        document_count: db.countPersonDocuments(person.id),
        relationship_count: relationships.length,
        relationships,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle radar_stats - Record counts for the configured database
 */
export async function handleStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(StatsInput, params);
    return formatResponse(successResult(requireDatabase().getStats()));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const recordTools: Record<string, ToolDefinition> = {
  radar_review_queue: {
    description:
      'List conflict records awaiting human review (victim diversions and claim conflicts), newest first.',
    inputSchema: {
      kind: z.enum(CONFLICT_KINDS).optional().describe('Only this kind of conflict'),
      limit: z.number().int().min(1).max(500).default(50).describe('Maximum records'),
    },
    handler: handleReviewQueue,
  },
  radar_person_get: {
    description:
      'Look up a stored person by name (case and spacing insensitive). Names on the victim-protection lexicon are refused.',
    inputSchema: {
      name: z.string().min(2).describe('Person name'),
    },
    handler: handlePersonGet,
  },
  radar_stats: {
    description: 'Record counts: documents, persons by confidence, events, relationships, conflicts, tokens used.',
    inputSchema: {},
    handler: handleStats,
  },
};
