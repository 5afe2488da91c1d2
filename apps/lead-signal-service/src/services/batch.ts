import { LeadInput, PriorityLabel, PriorityColor, ScoreBreakdown, SignalEvidence } from "../types/lead";
import { PatternCatalog } from "../catalog/patternCatalog";
import { scoreLead } from "./scoring";
import { priorityColor } from "./priority";

/**
 * Per-lead response shape shared by /score and /score/batch
 */
export interface LeadScoreResponse {
  score: number;
  priority_label: PriorityLabel;
  priority_color: PriorityColor;
  justification: string;
  breakdown: ScoreBreakdown | null;
  signals: readonly SignalEvidence[];
  success: boolean;
  error: string | null;
  timestamp: string;
}

export interface BatchScoreResponse {
  results: LeadScoreResponse[];
  total: number;
  successful: number;
  failed: number;
}

/**
 * Score one lead for the HTTP layer. Failures become an unsuccessful
 * result instead of an exception so one bad row never sinks a batch.
 */
export function scoreLeadForResponse(
  lead: LeadInput,
  catalog: PatternCatalog,
  now: () => Date = () => new Date()
): LeadScoreResponse {
  try {
    const scored = scoreLead(lead, catalog);
    return {
      score: scored.score,
      priority_label: scored.priority_label,
      priority_color: priorityColor(scored.score),
      justification: scored.justification,
      breakdown: scored.breakdown,
      signals: scored.signals,
      success: true,
      error: null,
      timestamp: now().toISOString(),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error(`[score] Failed to score lead:`, message);
    return {
      score: 0,
      priority_label: "Junk/Error",
      priority_color: "gray",
      justification: "Error processing.",
      breakdown: null,
      signals: [],
      success: false,
      error: message,
      timestamp: now().toISOString(),
    };
  }
}

/**
 * Score every lead of a batch. Scoring is synchronous and CPU-light, so the
 * batch runs in one pass; the HTTP layer bounds the batch size.
 */
export function scoreBatch(
  leads: readonly LeadInput[],
  catalog: PatternCatalog,
  now: () => Date = () => new Date()
): BatchScoreResponse {
  const results = leads.map(lead => scoreLeadForResponse(lead, catalog, now));
  const successful = results.filter(r => r.success).length;

  return {
    results,
    total: leads.length,
    successful,
    failed: results.length - successful,
  };
}
