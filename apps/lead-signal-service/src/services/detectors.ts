import {
  LeadInput,
  KeywordEvidence,
  KeywordContribution,
  RoleEvidence,
  CompanySizeEvidence,
  SizeCategory,
  UrgencyEvidence,
  BudgetEvidence,
  ScaleEvidence,
} from "../types/lead";
import { PatternCatalog, CappedPatternSet } from "../catalog/patternCatalog";

// ============================================================================
// SIGNAL DETECTORS
// Each detector is a pure function of (lead, catalog). None reads another's
// output, so they can run in any order.
// ============================================================================

/**
 * Keyword sentiment: accumulate-all over the high, medium and negative tables.
 */
export function detectKeywords(lead: LeadInput, catalog: PatternCatalog): KeywordEvidence {
  const messageLower = lead.message.toLowerCase();
  const contributions: KeywordContribution[] = [];

  for (const table of [catalog.keywords.high, catalog.keywords.medium, catalog.keywords.negative]) {
    for (const { keyword, weight } of table) {
      if (messageLower.includes(keyword)) {
        contributions.push({ keyword, weight });
      }
    }
  }

  return {
    component: "keyword",
    sub_score: contributions.reduce((sum, c) => sum + c.weight, 0),
    matched_tokens: contributions.map(c => c.keyword),
    flags: { has_negative: contributions.some(c => c.weight < 0) },
    contributions,
  };
}

/**
 * Role tier: first match wins, executive keywords before decision-maker keywords.
 */
export function detectRoleTier(lead: LeadInput, catalog: PatternCatalog): RoleEvidence {
  const roleLower = lead.role.toLowerCase();
  const { executive, decisionMaker, standardScore } = catalog.roles;

  const execMatch = executive.keywords.find(k => roleLower.includes(k));
  if (execMatch) {
    return {
      component: "role",
      sub_score: executive.score,
      matched_tokens: [execMatch],
      flags: { is_executive: true, is_decision_maker: false },
      tier: "Executive",
    };
  }

  const dmMatch = decisionMaker.keywords.find(k => roleLower.includes(k));
  if (dmMatch) {
    return {
      component: "role",
      sub_score: decisionMaker.score,
      matched_tokens: [dmMatch],
      flags: { is_executive: false, is_decision_maker: true },
      tier: "Decision-Maker",
    };
  }

  return {
    component: "role",
    sub_score: standardScore,
    matched_tokens: [],
    flags: { is_executive: false, is_decision_maker: false },
    tier: "Standard",
  };
}

/**
 * Company size: multiplier lookup plus a display category. Contributes no
 * additive points; the aggregator applies the multiplier.
 */
export function detectCompanySize(lead: LeadInput, catalog: PatternCatalog): CompanySizeEvidence {
  const table = catalog.companySize.multipliers;
  const known = Object.hasOwn(table, lead.company_size) ? table[lead.company_size] : undefined;
  const multiplier = known ?? catalog.companySize.defaultMultiplier;

  return {
    component: "company_size",
    sub_score: 0,
    matched_tokens: known === undefined ? [] : [lead.company_size],
    flags: { is_known_size: known !== undefined },
    multiplier,
    category: categorizeMultiplier(multiplier),
  };
}

export function categorizeMultiplier(multiplier: number): SizeCategory {
  if (multiplier >= 1.4) return "Enterprise";
  if (multiplier >= 1.0) return "Mid-Market";
  return "Small Business";
}

/**
 * Urgency: every matching pattern adds the increment, capped.
 */
export function detectUrgency(lead: LeadInput, catalog: PatternCatalog): UrgencyEvidence {
  const { score, matches } = sumCappedPatterns(lead.message, catalog.urgency);
  return {
    component: "urgency",
    sub_score: score,
    matched_tokens: matches,
    flags: { is_urgent: matches.length > 0 },
  };
}

/**
 * Budget: same additive-with-cap rule as urgency, over budget/funding patterns.
 */
export function detectBudget(lead: LeadInput, catalog: PatternCatalog): BudgetEvidence {
  const { score, matches } = sumCappedPatterns(lead.message, catalog.budget);
  return {
    component: "budget",
    sub_score: score,
    matched_tokens: matches,
    flags: { has_budget: matches.length > 0 },
  };
}

/**
 * Deployment scale: the first unit family that matches decides, even when its
 * head count is below every tier. Only one scale signal per message.
 */
export function detectScale(lead: LeadInput, catalog: PatternCatalog): ScaleEvidence {
  const messageLower = lead.message.toLowerCase();

  for (const { unit, pattern } of catalog.scale.units) {
    const match = pattern.exec(messageLower);
    if (!match) continue;

    const count = parseInt(match[1] ?? "", 10);
    const tier = Number.isNaN(count) ? undefined : catalog.scale.tiers.find(t => count >= t.min);

    if (!tier) {
      return unknownScale([match[0]]);
    }

    return {
      component: "scale",
      sub_score: tier.score,
      matched_tokens: [match[0]],
      flags: { has_scale: true },
      tier: tier.tier,
      description: `${tier.tier} scale (${count}+ ${unit})`,
    };
  }

  return unknownScale([]);
}

function unknownScale(matchedTokens: string[]): ScaleEvidence {
  return {
    component: "scale",
    sub_score: 0,
    matched_tokens: matchedTokens,
    flags: { has_scale: false },
    tier: null,
    description: "Unknown scale",
  };
}

function sumCappedPatterns(
  message: string,
  set: CappedPatternSet
): { score: number; matches: string[] } {
  const messageLower = message.toLowerCase();
  const matches: string[] = [];

  for (const pattern of set.patterns) {
    const match = pattern.exec(messageLower);
    if (match) {
      matches.push(match[0]);
    }
  }

  return { score: Math.min(matches.length * set.increment, set.cap), matches };
}

