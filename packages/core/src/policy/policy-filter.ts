import { readFileSync } from "node:fs";
import { z } from "zod";

export const PolicyCategorySchema = z.enum([
  "advice",
  "evaluation",
  "action",
  "selection",
  "dosage",
  "diagnosis",
  "treatment",
]);
export type PolicyCategory = z.infer<typeof PolicyCategorySchema>;

export const PolicyLanguageSchema = z.enum(["en", "he"]);
export type PolicyLanguage = z.infer<typeof PolicyLanguageSchema>;

export const PolicyRuleSetSchema = z.object({
  refusals: z.object({ en: z.string().min(1), he: z.string().min(1) }),
  rules: z.array(
    z.object({
      category: PolicyCategorySchema,
      language: PolicyLanguageSchema,
      pattern: z.string().min(1),
    })
  ),
});
export type PolicyRuleSet = z.infer<typeof PolicyRuleSetSchema>;

export type PolicyDecision =
  | { allowed: true }
  | {
      allowed: false;
      category: PolicyCategory;
      language: PolicyLanguage;
      reason: string;
    };

interface CompiledRule {
  category: PolicyCategory;
  language: PolicyLanguage;
  regex: RegExp;
}

const HEBREW = /[\u0590-\u05FF]/;

// JS `\b` only knows ASCII word characters, which never matches next to a
// Hebrew letter. Rules are written with `\b` and compiled with this instead.
const WORD_CHAR = "[\\p{L}\\p{N}_]";
const UNICODE_BOUNDARY = `(?:(?<!${WORD_CHAR})(?=${WORD_CHAR})|(?<=${WORD_CHAR})(?!${WORD_CHAR}))`;

export function isHebrew(text: string): boolean {
  return HEBREW.test(text);
}

export function compilePattern(pattern: string): RegExp {
  return new RegExp(pattern.replaceAll("\\b", UNICODE_BOUNDARY), "iu");
}

/**
 * Parses a rule set and checks every pattern compiles. Throws with the
 * offending pattern on failure.
 */
export function parsePolicyRules(raw: unknown): PolicyRuleSet {
  const result = PolicyRuleSetSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid policy rule set: ${issues}`);
  }
  for (const rule of result.data.rules) {
    try {
      compilePattern(rule.pattern);
    } catch (err) {
      throw new Error(
        `Invalid policy pattern ${JSON.stringify(rule.pattern)}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
  return result.data;
}

let defaultRuleSet: PolicyRuleSet | undefined;

/** The bundled rule set, read once. */
export function loadDefaultPolicyRules(): PolicyRuleSet {
  if (defaultRuleSet === undefined) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("./policy-rules.json", import.meta.url), "utf-8")
    );
    defaultRuleSet = parsePolicyRules(raw);
  }
  return defaultRuleSet;
}

/**
 * Keyword/pattern screen for medical-advice requests. Runs before any model
 * call. Only explicit rule matches block; everything else is allowed.
 *
 * Hebrew rules are only tried on text that contains Hebrew. The refusal is
 * given in Hebrew when the message contains Hebrew, English otherwise.
 */
export class PolicyFilter {
  private readonly rules: CompiledRule[];
  private readonly refusals: Record<PolicyLanguage, string>;

  constructor(ruleSet: PolicyRuleSet = loadDefaultPolicyRules()) {
    this.refusals = ruleSet.refusals;
    this.rules = ruleSet.rules.map((rule) => ({
      category: rule.category,
      language: rule.language,
      regex: compilePattern(rule.pattern),
    }));
  }

  evaluate(text: string): PolicyDecision {
    const hebrew = isHebrew(text);
    const language: PolicyLanguage = hebrew ? "he" : "en";

    for (const rule of this.rules) {
      if (rule.language === "he" && !hebrew) continue;
      if (rule.regex.test(text)) {
        return {
          allowed: false,
          category: rule.category,
          language,
          reason: this.refusals[language],
        };
      }
    }

    return { allowed: true };
  }
}
