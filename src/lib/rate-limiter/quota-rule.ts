/**
 * Quota rule definitions and validation.
 *
 * A rule caps the weighted number of operations inside a trailing time window.
 * Rules may be scoped to a subset of endpoint paths and may link to other
 * rules, so that one request is charged against several quotas at once
 * (e.g. an endpoint limit plus an account-wide limit).
 */

import * as v from "valibot";

import { ConfigurationError } from "../errors";

export type PathScope = string | RegExp | ((path: string) => boolean);

export interface LinkedLimit {
  /** Id of the rule that is also charged */
  limitId: string;
  /** Units charged against the linked rule */
  weight: number;
}

export interface QuotaRule {
  /** Unique identifier, usually the endpoint path the rule protects */
  id: string;
  /** Weighted units allowed inside the window */
  maxRequests: number;
  /** Window length (ms) */
  timeWindowMs: number;
  /** Restricts the rule to matching paths; a string matches as a prefix. Absent = every path. */
  pathScope?: PathScope;
  /** Units charged per matching request (default: 1) */
  weight?: number;
  /** Other rules charged whenever this one is */
  linkedLimits?: readonly LinkedLimit[];
  /** Charged only by requests naming the rule in `limitIds`, never by path */
  explicit?: boolean;
}

const pathScopeSchema = v.union([
  v.string(),
  v.instance(RegExp),
  v.custom<(path: string) => boolean>((input) => typeof input === "function", "Expected function"),
]);

export const quotaRuleSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1, "Rule id must not be empty")),
  maxRequests: v.pipe(
    v.number(),
    v.integer("maxRequests must be an integer"),
    v.minValue(1, "maxRequests must be greater than 0"),
  ),
  timeWindowMs: v.pipe(
    v.number(),
    v.finite("timeWindowMs must be finite"),
    v.check((value) => value > 0, "timeWindowMs must be greater than 0"),
  ),
  pathScope: v.optional(pathScopeSchema),
  weight: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1, "weight must be at least 1"))),
  linkedLimits: v.optional(
    v.array(
      v.object({
        limitId: v.pipe(v.string(), v.minLength(1)),
        weight: v.pipe(v.number(), v.integer(), v.minValue(0, "linked weight must not be negative")),
      }),
    ),
  ),
  explicit: v.optional(v.boolean()),
});

const formatIssues = (prefix: string, issues: readonly v.BaseIssue<unknown>[]): string[] =>
  issues.map((issue) => {
    const key = issue.path?.map((item) => String(item.key)).join(".");
    const location = [prefix, key].filter(Boolean).join(".");
    return location ? `${location}: ${issue.message}` : issue.message;
  });

const freezeRule = (rule: QuotaRule): QuotaRule =>
  Object.freeze({
    ...rule,
    linkedLimits: Object.freeze((rule.linkedLimits ?? []).map((link) => Object.freeze({ ...link }))),
  });

/**
 * Validates a single rule in isolation. Links are not resolved here.
 *
 * @throws ConfigurationError when the rule is malformed
 */
export const validateQuotaRule = (rule: QuotaRule): QuotaRule => {
  const result = v.safeParse(quotaRuleSchema, rule);
  if (!result.success) {
    const issues = formatIssues("", result.issues);
    throw new ConfigurationError(`Invalid quota rule: ${issues.join("; ")}`, issues);
  }
  return freezeRule(rule);
};

/**
 * Validates a rule set and returns frozen copies of its rules.
 *
 * @throws ConfigurationError when a rule is malformed, ids repeat, or a link
 * points to an id outside the set
 */
export const validateQuotaRules = (rules: readonly QuotaRule[]): readonly QuotaRule[] => {
  const issues: string[] = [];
  const validated: QuotaRule[] = [];

  rules.forEach((rule, index) => {
    const result = v.safeParse(quotaRuleSchema, rule);
    if (result.success) {
      validated.push(rule);
    } else {
      issues.push(...formatIssues(`rules[${index}]`, result.issues));
    }
  });

  const ids = new Set<string>();
  for (const rule of validated) {
    if (ids.has(rule.id)) {
      issues.push(`duplicate rule id "${rule.id}"`);
    }
    ids.add(rule.id);
  }

  for (const rule of validated) {
    for (const link of rule.linkedLimits ?? []) {
      if (!ids.has(link.limitId)) {
        issues.push(`rule "${rule.id}" links to unknown rule "${link.limitId}"`);
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid quota rules: ${issues.join("; ")}`, issues);
  }

  return validated.map(freezeRule);
};

/**
 * Checks whether a rule applies to a request path.
 */
export const matchesPath = (rule: QuotaRule, path: string): boolean => {
  const { pathScope } = rule;
  if (pathScope === undefined) {
    return true;
  }
  if (typeof pathScope === "string") {
    return path.startsWith(pathScope);
  }
  if (pathScope instanceof RegExp) {
    // Global and sticky patterns carry state in lastIndex
    pathScope.lastIndex = 0;
    return pathScope.test(path);
  }
  return pathScope(path);
};

/**
 * Effective cap after taking this process's share of the rule and then
 * holding back a safety margin (minimum 1).
 */
export const effectiveLimit = (
  rule: QuotaRule,
  sharePercentage: number,
  safetyMarginPercentage = 0,
): number =>
  Math.max(
    1,
    Math.floor((rule.maxRequests * sharePercentage * (100 - safetyMarginPercentage)) / 10_000),
  );

/**
 * Returns the rules whose ids are not in `excludedIds`.
 */
export const filterQuotaRules = (
  rules: readonly QuotaRule[],
  excludedIds: readonly string[],
): QuotaRule[] => {
  const excluded = new Set(excludedIds);
  return rules.filter((rule) => !excluded.has(rule.id));
};

export const describeQuotaRule = (rule: QuotaRule): string =>
  `${rule.id}: ${rule.maxRequests} per ${rule.timeWindowMs}ms` +
  (rule.weight !== undefined && rule.weight !== 1 ? ` (weight ${rule.weight})` : "") +
  (rule.linkedLimits && rule.linkedLimits.length > 0
    ? ` -> ${rule.linkedLimits.map((link) => `${link.limitId}x${link.weight}`).join(", ")}`
    : "");
