import {
  LeadInput,
  ScoredLead,
  ScoreBreakdown,
  SignalEvidence,
  KeywordEvidence,
  RoleEvidence,
  CompanySizeEvidence,
  UrgencyEvidence,
  BudgetEvidence,
  ScaleEvidence,
} from "../types/lead";
import { PatternCatalog } from "../catalog/patternCatalog";
import { InvalidInputError } from "../errors";
import {
  detectKeywords,
  detectRoleTier,
  detectCompanySize,
  detectUrgency,
  detectBudget,
  detectScale,
} from "./detectors";
import { classifyPriority } from "./priority";
import { synthesizeJustification } from "./justification";

/** Floor every structurally valid submission starts from */
export const BASE_SCORE = 20;

const MIN_SCORE = 0;
const MAX_SCORE = 100;

// ============================================================================
// MAIN SCORING FUNCTION
// ============================================================================

/**
 * Score a lead from its role, company size and message.
 * Deterministic: the same input and catalog always produce the same result.
 */
export function scoreLead(input: LeadInput, catalog: PatternCatalog): ScoredLead {
  assertLeadInput(input);

  const evidence: DetectorEvidence = {
    keyword: detectKeywords(input, catalog),
    role: detectRoleTier(input, catalog),
    companySize: detectCompanySize(input, catalog),
    urgency: detectUrgency(input, catalog),
    budget: detectBudget(input, catalog),
    scale: detectScale(input, catalog),
  };

  const breakdown = aggregateScore(evidence);
  const signals: SignalEvidence[] = [
    evidence.keyword,
    evidence.role,
    evidence.companySize,
    evidence.urgency,
    evidence.budget,
    evidence.scale,
  ];

  return Object.freeze({
    score: breakdown.final_score,
    priority_label: classifyPriority(breakdown.final_score),
    justification: synthesizeJustification(signals, breakdown.final_score),
    signals: Object.freeze(signals),
    breakdown,
  });
}

// ============================================================================
// AGGREGATION
// ============================================================================

export interface DetectorEvidence {
  keyword: KeywordEvidence;
  role: RoleEvidence;
  companySize: CompanySizeEvidence;
  urgency: UrgencyEvidence;
  budget: BudgetEvidence;
  scale: ScaleEvidence;
}

/**
 * Sum base + sub-scores, multiply the whole sum by the company-size multiplier,
 * round once, then clamp to 0-100.
 */
export function aggregateScore(evidence: DetectorEvidence): ScoreBreakdown {
  const total =
    BASE_SCORE +
    evidence.keyword.sub_score +
    evidence.role.sub_score +
    evidence.urgency.sub_score +
    evidence.budget.sub_score +
    evidence.scale.sub_score;

  const multiplier = evidence.companySize.multiplier;
  // Multiply in integer hundredths so .5 ties stay exact
  const hundredths = Math.round(multiplier * 100);
  const finalScore = clampScore(Math.round((total * hundredths) / 100));

  return Object.freeze({
    base: BASE_SCORE,
    keyword: evidence.keyword.sub_score,
    role: evidence.role.sub_score,
    urgency: evidence.urgency.sub_score,
    budget: evidence.budget.sub_score,
    scale: evidence.scale.sub_score,
    pre_multiplier_total: total,
    size_multiplier: multiplier,
    final_score: finalScore,
  });
}

function clampScore(score: number): number {
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, score));
}

function assertLeadInput(input: LeadInput): void {
  // Guards callers outside the type system (plain JS, untyped JSON)
  if (typeof input !== "object" || input === null) {
    throw new InvalidInputError("lead", "Lead must be an object with role, company_size and message");
  }
  const fields: Array<keyof LeadInput> = ["role", "company_size", "message"];
  for (const field of fields) {
    const value: unknown = input[field];
    if (typeof value !== "string") {
      throw new InvalidInputError(field, `Lead field "${field}" must be a string, got ${typeof value}`);
    }
  }
}
