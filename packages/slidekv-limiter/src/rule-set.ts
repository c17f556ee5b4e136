import { RuleSetConfigSchema } from "@slidekv/contracts";
import { ConfigurationError } from "./errors.js";
import type { LimitRule } from "./types.js";

function isPositiveSafeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

/**
 * Ordered "max actions per window" rules scoped under a storage namespace.
 *
 * The pruning horizon of every stored record is derived from these rules, so
 * a rule set is sealed once a limiter starts using it and rejects further
 * limits from then on.
 */
export class RuleSet {
  readonly namespace: string;
  private readonly limits: LimitRule[] = [];
  private isSealed = false;

  constructor(namespace: string) {
    if (namespace.trim().length === 0) {
      throw new ConfigurationError("Rule set namespace must not be empty");
    }
    this.namespace = namespace;
  }

  static fromConfig(input: unknown): RuleSet {
    const parsed = RuleSetConfigSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError("Invalid rule set configuration", parsed.error.flatten());
    }
    const ruleSet = new RuleSet(parsed.data.namespace);
    for (const rule of parsed.data.rules) {
      ruleSet.addLimit(rule.windowMs, rule.max);
    }
    return ruleSet;
  }

  addLimit(windowMs: number, max: number): this {
    if (this.isSealed) {
      throw new ConfigurationError(`Rule set ${this.namespace} is in use and cannot take new limits`);
    }
    if (!isPositiveSafeInteger(windowMs)) {
      throw new ConfigurationError(`Window must be a positive whole number of milliseconds, got ${windowMs}`);
    }
    if (!isPositiveSafeInteger(max)) {
      throw new ConfigurationError(`Max count must be a positive integer, got ${max}`);
    }
    this.limits.push(Object.freeze({ windowMs, max }));
    return this;
  }

  seal(): this {
    this.isSealed = true;
    return this;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  get rules(): readonly LimitRule[] {
    return this.limits;
  }

  get isEmpty(): boolean {
    return this.limits.length === 0;
  }

  /** Longest configured window, 0 for an empty set. */
  get horizonMs(): number {
    return this.limits.reduce((horizon, rule) => Math.max(horizon, rule.windowMs), 0);
  }

  get expirationTtlSeconds(): number {
    return Math.ceil(this.horizonMs / 1000) + 1;
  }

  storageKey(key: string): string {
    return `${this.namespace}/${key}`;
  }
}
