import { SignalEvidence } from "../types/lead";
import { classifyPriority } from "./priority";

const MAX_PHRASES = 4;

/**
 * Build a short explanation from detector evidence, strongest factors first.
 * Falls back to a score-banded phrase when no evidence qualifies.
 */
export function synthesizeJustification(
  signals: readonly SignalEvidence[],
  score: number
): string {
  const phrases: string[] = [];

  for (const signal of signals) {
    if (signal.component === "role") {
      if (signal.tier === "Executive") phrases.push("C-suite authority");
      else if (signal.tier === "Decision-Maker") phrases.push("Decision maker role");
    }
  }
  if (signals.some(s => s.component === "urgency" && s.flags.is_urgent)) {
    phrases.push("urgent signals");
  }
  if (signals.some(s => s.component === "budget" && s.flags.has_budget)) {
    phrases.push("budget mentioned");
  }
  for (const signal of signals) {
    if (signal.component === "scale") {
      if (signal.tier === "Enterprise") phrases.push("enterprise scale");
      else if (signal.tier === "Mid-market") phrases.push("mid-market scale");
    }
  }
  if (signals.some(s => s.component === "company_size" && s.category === "Enterprise")) {
    phrases.push("large company");
  }

  if (phrases.length > 0) {
    return phrases.slice(0, MAX_PHRASES).join(", ");
  }

  switch (classifyPriority(score)) {
    case "High Priority":
    case "Medium Priority":
      return "Moderate fit, some positive signals";
    case "Low Priority":
      return "Low fit, limited positive signals";
    case "Junk/Error":
      return "Poor fit or spam indicators";
  }
}
