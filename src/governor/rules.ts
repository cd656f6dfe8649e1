/**
 * Ordered table mapping free-form resource class names (model ids, service
 * names) onto a small set of canonical buckets. First match wins; every
 * condition a rule sets must hold.
 */
export type NormalizationRule = {
  bucket: string;
  prefix?: string;
  includes?: string[];
  includesAny?: string[];
};

export const DEFAULT_BUCKET = "_default";

export const DEFAULT_RULES: readonly NormalizationRule[] = [
  { bucket: "opus", includes: ["opus"] },
  { bucket: "sonnet", includes: ["sonnet"] },
  { bucket: "haiku", includes: ["haiku"] },
  { bucket: "gemini-flash", includes: ["gemini", "flash"] },
  { bucket: "gemini-pro", includes: ["gemini"], includesAny: ["pro", "high"] },
  { bucket: "gpt", includes: ["gpt"] },
  { bucket: "gpt", prefix: "o1" },
  { bucket: "gpt", prefix: "o3" },
];

function matches(rule: NormalizationRule, name: string): boolean {
  if (rule.prefix === undefined && rule.includes === undefined && rule.includesAny === undefined) return false;
  if (rule.prefix !== undefined && !name.startsWith(rule.prefix)) return false;
  if (rule.includes && !rule.includes.every((s) => name.includes(s))) return false;
  if (rule.includesAny && !rule.includesAny.some((s) => name.includes(s))) return false;
  return true;
}

/** Bucket named by the first matching rule, else the lower-cased name itself. */
export function canonicalBucket(name: string, rules: readonly NormalizationRule[] = DEFAULT_RULES): string {
  const lower = name.trim().toLowerCase();
  return rules.find((r) => matches(r, lower))?.bucket ?? lower;
}

/**
 * Resolve a resource class to the bucket that governs it. Names that map to
 * no configured bucket fall back to `_default`.
 */
export function normalizeResourceClass(
  name: string,
  limits: Readonly<Record<string, number>>,
  rules: readonly NormalizationRule[] = DEFAULT_RULES,
): string {
  const bucket = canonicalBucket(name, rules);
  return Object.hasOwn(limits, bucket) ? bucket : DEFAULT_BUCKET;
}
