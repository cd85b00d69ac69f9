// ============================================
// Structured output schema for decision synthesis
// Sent to the model as a JSON schema and re-validated on receipt.
// ============================================

import { z } from "zod";
import { CONFIDENCE_TIERS } from "../evidence/types.js";

export const decisionOptionSchema = z.object({
  name: z.string().min(1),
  pros: z.array(z.string()),
  cons: z.array(z.string()),
  risks: z.array(z.string()),
  cost: z.string(),
});

export const decisionDraftSchema = z.object({
  summary: z.string().min(1),
  options: z.array(decisionOptionSchema),
  recommendation: z.string().min(1),
  confidence: z.enum(CONFIDENCE_TIERS),
  reasoning: z.string().min(1),
  /** Evidence unit ids backing the answer, e.g. ["E1", "E4"] */
  citations: z.array(z.string()),
  conflicts_or_gaps: z.array(z.string()),
});

/** Raw model output before citation validation */
export type DecisionDraft = z.infer<typeof decisionDraftSchema>;

export const DECISION_SCHEMA_NAME = "decision_response";
