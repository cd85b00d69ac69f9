// ============================================
// Stance Lexicon — keyword markers for support / opposition
// A lexical heuristic, not entailment: expect missed conflicts.
// ============================================

import fs from "fs";
import { z } from "zod";
import { validationError } from "../lib/errors.js";

export type Stance = "support" | "oppose";

export const stanceLexiconSchema = z
  .object({
    support: z.array(z.string().min(1)).min(1),
    oppose: z.array(z.string().min(1)).min(1),
  })
  .strict();

export type StanceLexicon = z.infer<typeof stanceLexiconSchema>;

export const DEFAULT_STANCE_LEXICON: StanceLexicon = {
  support: [
    "favor",
    "favors",
    "favour",
    "favours",
    "in favor of",
    "support",
    "supports",
    "recommend",
    "recommends",
    "recommended",
    "endorse",
    "endorses",
    "approve",
    "approves",
    "approved",
    "prefer",
    "prefers",
    "backs",
  ],
  // Negated phrases are matched (and removed) before any support marker
  oppose: [
    "oppose",
    "opposes",
    "opposed",
    "against",
    "reject",
    "rejects",
    "rejected",
    "objects to",
    "disapproves",
    "does not support",
    "do not support",
    "doesn't support",
    "does not recommend",
    "do not recommend",
    "doesn't recommend",
    "not recommended",
    "advise against",
  ],
};

function normalizeText(text: string): string {
  const folded = text
    .toLowerCase()
    .replace(/[’]/g, "'")
    .replace(/[^\p{L}\p{N}'\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
  return ` ${folded} `;
}

function byLengthDesc(a: string, b: string): number {
  return b.length - a.length;
}

/**
 * Classify a claim's stance. Returns undefined for neutral text and for text
 * carrying both stances.
 */
export function detectStance(text: string, lexicon: StanceLexicon = DEFAULT_STANCE_LEXICON): Stance | undefined {
  let remaining = normalizeText(text);
  let opposes = false;

  for (const phrase of [...lexicon.oppose].sort(byLengthDesc)) {
    const marker = ` ${normalizeText(phrase).trim()} `;
    if (remaining.includes(marker)) {
      opposes = true;
      remaining = remaining.split(marker).join("  ");
    }
  }

  const supports = [...lexicon.support]
    .sort(byLengthDesc)
    .some((phrase) => remaining.includes(` ${normalizeText(phrase).trim()} `));

  if (opposes === supports) return undefined;
  return opposes ? "oppose" : "support";
}

/** Read and validate a lexicon override file */
export function loadStanceLexicon(path: string): StanceLexicon {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, "utf8"));
  } catch (err) {
    throw validationError(`Could not read stance lexicon at ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = stanceLexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw validationError(`Invalid stance lexicon at ${path}`, {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return parsed.data;
}
