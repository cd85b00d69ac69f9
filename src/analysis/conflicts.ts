// ============================================
// Conflict detection — opposing stances on a shared subject
// ============================================

import { logger } from "../lib/logger.js";
import { normalizeEntity } from "../store/filters.js";
import type { ConflictRecord, EvidenceUnit } from "../evidence/types.js";
import { DEFAULT_STANCE_LEXICON, detectStance, type Stance, type StanceLexicon } from "./stanceLexicon.js";

/** Two or more capitalised tokens in a row: "Team X", "Option C", "Payments Platform" */
const NAME_PHRASE = /\b[A-Z][\p{L}\p{N}-]*(?:\s+[A-Z][\p{L}\p{N}-]*)+/gu;

interface Subject {
  key: string;
  label: string;
}

/**
 * Named subjects of a unit: its entity ids, then capitalised name phrases in the claim.
 */
export function subjectsOf(unit: EvidenceUnit): Subject[] {
  const subjects = new Map<string, Subject>();

  for (const entity of unit.entityIds) {
    const key = normalizeEntity(entity);
    if (key && !subjects.has(key)) subjects.set(key, { key, label: entity });
  }
  for (const match of unit.claim.matchAll(NAME_PHRASE)) {
    const label = match[0].trim();
    const key = normalizeEntity(label);
    if (key && !subjects.has(key)) subjects.set(key, { key, label });
  }

  return [...subjects.values()];
}

const STANCE_VERB: Record<Stance, string> = {
  support: "is in favour",
  oppose: "is opposed",
};

/**
 * Flag unit pairs that address the same subject with opposing stance markers,
 * including two messages of one chat thread. One record per pair.
 */
export function analyzeConflicts(
  units: EvidenceUnit[],
  lexicon: StanceLexicon = DEFAULT_STANCE_LEXICON,
  requestId?: string
): ConflictRecord[] {
  const profiles = units.map((unit) => ({
    unit,
    stance: detectStance(unit.claim, lexicon),
    subjects: subjectsOf(unit),
  }));

  const conflicts: ConflictRecord[] = [];

  for (let i = 0; i < profiles.length; i++) {
    const left = profiles[i];
    if (!left?.stance) continue;

    for (let j = i + 1; j < profiles.length; j++) {
      const right = profiles[j];
      if (!right?.stance || right.stance === left.stance) continue;

      const rightKeys = new Set(right.subjects.map((s) => s.key));
      const shared = left.subjects.find((s) => rightKeys.has(s.key));
      if (!shared) continue;

      conflicts.push({
        subject: shared.label,
        description:
          `Sources disagree on ${shared.label}: "${left.unit.sourceDocumentId}" (${left.unit.location}) ` +
          `${STANCE_VERB[left.stance]} while "${right.unit.sourceDocumentId}" (${right.unit.location}) ` +
          `${STANCE_VERB[right.stance]}.`,
        left: left.unit,
        right: right.unit,
      });
    }
  }

  logger.info("Conflict analysis complete", {
    stage: "analysis",
    requestId,
    unitCount: units.length,
    stancedUnits: profiles.filter((p) => p.stance).length,
    conflictCount: conflicts.length,
  });

  return conflicts;
}
