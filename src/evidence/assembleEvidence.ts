// ============================================
// Evidence Assembler — candidates -> attributable evidence units
// ============================================

import { logger } from "../lib/logger.js";
import { entityKeysOf } from "../store/filters.js";
import type { ScoredCandidate } from "../types/index.js";
import type { AssembledEvidence, EvidenceUnit } from "./types.js";

/** Default context budget, in estimated tokens */
export const DEFAULT_TOKEN_BUDGET = 3000;

/** Documents of this many top candidates must not vanish silently */
const PROTECTED_TOP_CANDIDATES = 3;

/** Rough token estimate: four characters per token */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

type DraftUnit = Omit<EvidenceUnit, "id"> & { candidates: ScoredCandidate[] };

/**
 * Assemble evidence units under a token budget.
 *
 * - Documents keep the rank order of their best candidate
 * - Tabular rows sharing a record key in one document merge into one unit
 * - Units are taken in order until the next would overflow; nothing is split
 * - A top-3 document dropped entirely becomes a gap
 */
export function assembleEvidence(
  candidates: ScoredCandidate[],
  tokenBudget: number = DEFAULT_TOKEN_BUDGET,
  requestId?: string
): AssembledEvidence {
  const ordered = [...candidates].sort((a, b) => a.rank - b.rank);
  const drafts = groupByDocument(ordered).flatMap(buildDocumentUnits);

  const units: EvidenceUnit[] = [];
  const dropped: ScoredCandidate[] = [];
  let used = 0;
  let overflowed = false;

  for (const draft of drafts) {
    const cost = estimateTokens(draft.claim);
    if (overflowed || used + cost > tokenBudget) {
      overflowed = true;
      dropped.push(...draft.candidates);
      continue;
    }
    used += cost;
    const { candidates: _sources, ...unit } = draft;
    units.push({ id: `E${units.length + 1}`, ...unit });
  }

  const gaps = findBudgetGaps(ordered, units);

  logger.info("Evidence assembled", {
    stage: "evidence",
    requestId,
    candidateCount: candidates.length,
    unitCount: units.length,
    droppedCandidates: dropped.length,
    tokensUsed: used,
    tokenBudget,
    gapCount: gaps.length,
  });

  return { units, dropped, gaps };
}

function groupByDocument(ordered: ScoredCandidate[]): ScoredCandidate[][] {
  const groups = new Map<string, ScoredCandidate[]>();
  for (const candidate of ordered) {
    const docId = candidate.chunk.metadata.document_id;
    const group = groups.get(docId);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(docId, [candidate]);
    }
  }
  return [...groups.values()];
}

/**
 * Narrative sections and chat messages stand alone; tabular rows of the same
 * logical record collapse so a duplicated row is cited once.
 */
function buildDocumentUnits(group: ScoredCandidate[]): DraftUnit[] {
  const recordGroups = new Map<string, ScoredCandidate[]>();
  const result: ScoredCandidate[][] = [];

  for (const candidate of group) {
    const key = recordKey(candidate);
    if (key === undefined) {
      result.push([candidate]);
      continue;
    }
    const existing = recordGroups.get(key);
    if (existing) {
      existing.push(candidate);
    } else {
      const members = [candidate];
      recordGroups.set(key, members);
      result.push(members);
    }
  }

  return result.map(toDraftUnit);
}

function recordKey(candidate: ScoredCandidate): string | undefined {
  const meta = candidate.chunk.metadata;
  if (meta.source_type !== "tabular-row") return undefined;
  return meta.record_id ?? meta.entity_ids[0];
}

function toDraftUnit(members: ScoredCandidate[]): DraftUnit {
  const [first, ...rest] = members;
  if (!first) {
    throw new Error("Evidence unit needs at least one candidate");
  }
  const meta = first.chunk.metadata;

  return {
    claim: distinct(members.map((m) => m.chunk.text.trim())).join("\n"),
    sourceDocumentId: meta.document_id,
    sourceType: meta.source_type,
    location: distinct(members.map((m) => m.chunk.metadata.location)).join("; "),
    chunkIds: members.map((m) => m.chunk.id),
    entityIds: distinct(members.flatMap((m) => entityKeysOf(m.chunk))),
    date: meta.date ?? rest.find((m) => m.chunk.metadata.date)?.chunk.metadata.date,
    rank: Math.min(...members.map((m) => m.rank)),
    score: Math.max(...members.map((m) => m.score)),
    candidates: members,
  };
}

function findBudgetGaps(ordered: ScoredCandidate[], units: EvidenceUnit[]): string[] {
  const kept = new Set(units.map((u) => u.sourceDocumentId));
  const topDocuments = distinct(
    ordered.slice(0, PROTECTED_TOP_CANDIDATES).map((c) => c.chunk.metadata.document_id)
  );

  return topDocuments
    .filter((docId) => !kept.has(docId))
    .map((docId) => `Evidence from "${docId}" ranked in the top ${PROTECTED_TOP_CANDIDATES} but was omitted to fit the context budget.`);
}

function distinct(values: string[]): string[] {
  return [...new Set(values)];
}
