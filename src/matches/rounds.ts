import type { RoundLabelStyle } from "../types";

const ROUND_NAMES: Record<string, string> = {
  QF: "Quarterfinal",
  SF: "Semifinal",
  F: "Final"
};

// Order matters: "Round of 16 - Quarterfinal" must land on QF, and
// "Semifinal" must not be read as a bare final.
const ROUND_RULES: Array<{ pattern: RegExp; label: (match: RegExpExecArray) => string }> = [
  { pattern: /\bsemi[-\s]?finals?\b/i, label: () => "SF" },
  { pattern: /\bquarter[-\s]?finals?\b/i, label: () => "QF" },
  { pattern: /\bfinal\b/i, label: () => "F" },
  { pattern: /\bround\s+of\s+(\d{1,3})\b/i, label: (match) => `R${match[1]}` },
  { pattern: /\bR\s*(\d{1,3})\b/i, label: (match) => `R${match[1]}` },
  { pattern: /\b(QF|SF|F)\b/i, label: (match) => match[1].toUpperCase() }
];

export function classifyRound(description: string): string {
  const text = description.trim();
  if (text.length === 0) return "";
  for (const rule of ROUND_RULES) {
    const match = rule.pattern.exec(text);
    if (match) {
      return rule.label(match);
    }
  }
  return "";
}

export function describeRound(label: string, style: RoundLabelStyle = "long"): string {
  if (style === "short") return label;
  return ROUND_NAMES[label] ?? label;
}
