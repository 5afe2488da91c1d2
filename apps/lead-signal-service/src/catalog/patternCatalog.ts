import fs from "fs";
import { z } from "zod";
import { ConfigurationError } from "../errors";
import { ScaleTier } from "../types/lead";
import bundledCatalog from "./pattern-catalog.json";

// ============================================================================
// CATALOG SHAPE
// ============================================================================

export interface KeywordWeight {
  readonly keyword: string;
  readonly weight: number;
}

export interface RoleRule {
  readonly score: number;
  readonly keywords: readonly string[];
}

/**
 * Additive detector: every matching pattern adds `increment`, total capped at `cap`
 */
export interface CappedPatternSet {
  readonly increment: number;
  readonly cap: number;
  readonly patterns: readonly RegExp[];
}

export interface ScaleUnit {
  readonly unit: string;
  /** Group 1 captures the head count */
  readonly pattern: RegExp;
}

export interface ScaleTierRule {
  readonly tier: ScaleTier;
  readonly min: number;
  readonly score: number;
}

/**
 * Process-wide, read-only scoring tables. Build once with loadPatternCatalog()
 * and pass the same value into every scoring call.
 */
export interface PatternCatalog {
  readonly version: string;
  readonly keywords: {
    readonly high: readonly KeywordWeight[];
    readonly medium: readonly KeywordWeight[];
    readonly negative: readonly KeywordWeight[];
  };
  readonly roles: {
    readonly executive: RoleRule;
    readonly decisionMaker: RoleRule;
    readonly standardScore: number;
  };
  readonly companySize: {
    readonly defaultMultiplier: number;
    /** Frozen lookup table; read with Object.hasOwn */
    readonly multipliers: Readonly<Record<string, number>>;
  };
  readonly urgency: CappedPatternSet;
  readonly budget: CappedPatternSet;
  readonly scale: {
    readonly units: readonly ScaleUnit[];
    /** Sorted by descending `min` */
    readonly tiers: readonly ScaleTierRule[];
  };
}

// ============================================================================
// FILE SCHEMA
// ============================================================================

// Integer-like keys would be enumerated ahead of the others and break match order
const keywordTable = z.record(
  z.string().min(1).regex(/\D/, "keyword must not be all digits"),
  z.number().int()
);

// Two decimals at most, so scoring can multiply in exact hundredths
const sizeMultiplier = z.number().positive().refine(
  value => Math.abs(value * 100 - Math.round(value * 100)) < 1e-9,
  "multiplier must have at most two decimal places"
);

const roleRule = z.object({
  score: z.number().int(),
  keywords: z.array(z.string().min(1)).min(1),
});

const cappedPatterns = z.object({
  increment: z.number().int().positive(),
  cap: z.number().int().positive(),
  patterns: z.array(z.string().min(1)).min(1),
});

const catalogFileSchema = z.object({
  version: z.string().min(1),
  keywords: z.object({
    high: keywordTable,
    medium: keywordTable,
    negative: keywordTable,
  }),
  roles: z.object({
    executive: roleRule,
    decision_maker: roleRule,
    standard_score: z.number().int(),
  }),
  company_size: z.object({
    default_multiplier: sizeMultiplier,
    multipliers: z.record(z.string().min(1), sizeMultiplier),
  }),
  urgency: cappedPatterns,
  budget: cappedPatterns,
  scale: z.object({
    units: z.array(z.object({
      unit: z.string().min(1),
      pattern: z.string().min(1),
    })).min(1),
    tiers: z.array(z.object({
      tier: z.enum(["Enterprise", "Mid-market", "Small-medium"]),
      min: z.number().int().nonnegative(),
      score: z.number().int(),
    })).min(1),
  }),
});

export type PatternCatalogFile = z.infer<typeof catalogFileSchema>;

// ============================================================================
// LOADING
// ============================================================================

/**
 * Load the catalog from a JSON file, or the bundled default when no path is given.
 * Throws ConfigurationError on any problem.
 */
export function loadPatternCatalog(filePath?: string): PatternCatalog {
  if (!filePath) {
    const catalog = parsePatternCatalog(bundledCatalog);
    console.log(`[catalog] Loaded bundled pattern catalog ${catalog.version}`);
    return catalog;
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read pattern catalog ${filePath}`, [message]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Pattern catalog ${filePath} is not valid JSON`, [message]);
  }

  const catalog = parsePatternCatalog(raw);
  console.log(`[catalog] Loaded pattern catalog ${catalog.version} from ${filePath}`);
  return catalog;
}

/**
 * Validate a decoded catalog document and compile its patterns.
 */
export function parsePatternCatalog(raw: unknown): PatternCatalog {
  const parsed = catalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid pattern catalog",
      parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const file = parsed.data;
  const issues: string[] = [];

  const compile = (source: string, path: string): RegExp => {
    try {
      return new RegExp(source);
    } catch (error) {
      issues.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
      return /$^/;
    }
  };

  const urgencyPatterns = file.urgency.patterns.map((p, i) => compile(p, `urgency.patterns.${i}`));
  const budgetPatterns = file.budget.patterns.map((p, i) => compile(p, `budget.patterns.${i}`));

  const scaleUnits = file.scale.units.map((u, i) => {
    const pattern = compile(u.pattern, `scale.units.${i}.pattern`);
    if (countCaptureGroups(pattern) < 1) {
      issues.push(`scale.units.${i}.pattern: must capture the head count in group 1`);
    }
    return { unit: u.unit, pattern };
  });

  const tiers = [...file.scale.tiers].sort((a, b) => b.min - a.min);

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid pattern catalog", issues);
  }

  return deepFreeze({
    version: file.version,
    keywords: {
      high: toKeywordWeights(file.keywords.high),
      medium: toKeywordWeights(file.keywords.medium),
      negative: toKeywordWeights(file.keywords.negative),
    },
    roles: {
      executive: normalizeRoleRule(file.roles.executive),
      decisionMaker: normalizeRoleRule(file.roles.decision_maker),
      standardScore: file.roles.standard_score,
    },
    companySize: {
      defaultMultiplier: file.company_size.default_multiplier,
      multipliers: { ...file.company_size.multipliers },
    },
    urgency: { increment: file.urgency.increment, cap: file.urgency.cap, patterns: urgencyPatterns },
    budget: { increment: file.budget.increment, cap: file.budget.cap, patterns: budgetPatterns },
    scale: { units: scaleUnits, tiers },
  });
}

// ============================================================================
// HELPERS
// ============================================================================

function toKeywordWeights(table: Record<string, number>): KeywordWeight[] {
  // No integer-like keys, so entry order is file order and match order
  return Object.entries(table).map(([keyword, weight]) => ({
    keyword: keyword.toLowerCase(),
    weight,
  }));
}

function normalizeRoleRule(rule: { score: number; keywords: string[] }): RoleRule {
  return { score: rule.score, keywords: rule.keywords.map(k => k.toLowerCase()) };
}

function countCaptureGroups(pattern: RegExp): number {
  // An empty alternative always matches, so the result length reveals the group count
  const match = new RegExp(`${pattern.source}|`).exec("");
  return match ? match.length - 1 : 0;
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === "object" && !(child instanceof RegExp) && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
