/**
 * Lead Signal Scoring Types
 * Shared by the scoring engine and the HTTP layer
 */

// ============================================================================
// ENUMS
// ============================================================================

export type CompanySizeBand = '1-10' | '10-50' | '50-200' | '200-500' | '500-1000' | '1000+';
export type RoleTier = 'Executive' | 'Decision-Maker' | 'Standard';
export type SizeCategory = 'Enterprise' | 'Mid-Market' | 'Small Business';
export type ScaleTier = 'Enterprise' | 'Mid-market' | 'Small-medium';
export type PriorityLabel = 'High Priority' | 'Medium Priority' | 'Low Priority' | 'Junk/Error';
export type PriorityColor = 'red' | 'orange' | 'blue' | 'gray';

export const COMPANY_SIZE_BANDS: readonly CompanySizeBand[] = [
  '1-10', '10-50', '50-200', '200-500', '500-1000', '1000+',
];

// ============================================================================
// INPUT
// ============================================================================

/**
 * One inbound lead as submitted by a form, CSV row or API caller.
 * `company_size` is expected to be a CompanySizeBand but any string is accepted.
 */
export interface LeadInput {
  readonly role: string;
  readonly company_size: string;
  readonly message: string;
}

// ============================================================================
// EVIDENCE (one record per detector)
// ============================================================================

interface EvidenceBase<C extends string, F> {
  readonly component: C;
  /** Additive contribution before the company-size multiplier */
  readonly sub_score: number;
  /** Keywords or pattern matches, in match order */
  readonly matched_tokens: readonly string[];
  readonly flags: Readonly<F>;
}

export interface KeywordContribution {
  readonly keyword: string;
  /** Signed weight, negative for spam/low-intent vocabulary */
  readonly weight: number;
}

export interface KeywordEvidence extends EvidenceBase<'keyword', { has_negative: boolean }> {
  readonly contributions: readonly KeywordContribution[];
}

export interface RoleEvidence extends EvidenceBase<'role', { is_executive: boolean; is_decision_maker: boolean }> {
  readonly tier: RoleTier;
}

export interface CompanySizeEvidence extends EvidenceBase<'company_size', { is_known_size: boolean }> {
  readonly multiplier: number;
  readonly category: SizeCategory;
}

export type UrgencyEvidence = EvidenceBase<'urgency', { is_urgent: boolean }>;

export type BudgetEvidence = EvidenceBase<'budget', { has_budget: boolean }>;

export interface ScaleEvidence extends EvidenceBase<'scale', { has_scale: boolean }> {
  readonly tier: ScaleTier | null;
  /** e.g. "Enterprise scale (500+ users)" or "Unknown scale" */
  readonly description: string;
}

export type SignalEvidence =
  | KeywordEvidence
  | RoleEvidence
  | CompanySizeEvidence
  | UrgencyEvidence
  | BudgetEvidence
  | ScaleEvidence;

export type SignalComponent = SignalEvidence['component'];

// ============================================================================
// RESULT
// ============================================================================

export interface ScoreBreakdown {
  readonly base: number;
  readonly keyword: number;
  readonly role: number;
  readonly urgency: number;
  readonly budget: number;
  readonly scale: number;
  /** Sum of every additive component, including base */
  readonly pre_multiplier_total: number;
  readonly size_multiplier: number;
  /** Integer in [0, 100] */
  readonly final_score: number;
}

export interface ScoredLead {
  readonly score: number;
  readonly priority_label: PriorityLabel;
  readonly justification: string;
  readonly signals: readonly SignalEvidence[];
  readonly breakdown: ScoreBreakdown;
}
