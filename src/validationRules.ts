export type ValidationRule =
  | { kind: "required" }
  | { kind: "email_format" }
  | { kind: "min_length"; length: number }
  | { kind: "exact_length"; length: number }
  | { kind: "number_only" };

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const LENGTH_RULE = /^(min_length|exact_length):\s*(\d+)$/;

/**
 * Parses a field's comma-separated validation string. Unknown tokens
 * (including "optional") and length rules without a usable number are
 * dropped.
 */
export function parseValidationRules(validation: string): ValidationRule[] {
  const rules: ValidationRule[] = [];
  for (const raw of validation.split(",")) {
    const rule = parseRuleToken(raw.trim());
    if (rule) rules.push(rule);
  }
  return rules;
}

export function parseRuleToken(token: string): ValidationRule | null {
  switch (token) {
    case "required":
    case "email_format":
    case "number_only":
      return { kind: token };
  }

  const match = LENGTH_RULE.exec(token);
  if (!match) return null;
  const length = Number.parseInt(match[2], 10);
  return match[1] === "min_length"
    ? { kind: "min_length", length }
    : { kind: "exact_length", length };
}

export function hasRule(rules: ValidationRule[], kind: ValidationRule["kind"]): boolean {
  return rules.some((r) => r.kind === kind);
}

/** Length in code points, so an emoji counts as one character. */
export function characterCount(text: string): number {
  return [...text].length;
}

/** Removes the first "." so "12.5" reads as "125". */
export function stripFirstDecimalPoint(text: string): string {
  return text.replace(".", "");
}

export function isNumberOnly(text: string): boolean {
  return /^\d+$/.test(stripFirstDecimalPoint(text));
}
