/**
 * Decision-point patterns. Each one is counted on its own, so `else if (`
 * contributes to both the `if` and the `else if` count.
 */
export const DECISION_POINT_PATTERNS: readonly RegExp[] = [
  /\bif\s*\(/g,
  /\belse\s+if\s*\(/g,
  /\bwhile\s*\(/g,
  /\bfor\s*\(/g,
  /\bforeach\s*\(/g,
  /\bcase\s+/g,
  /\bcatch\s*\(/g,
  /&&/g,
  /\|\|/g,
  /\?/g,
];

/**
 * Cyclomatic complexity estimate: 1 + number of decision points in the span
 */
export function calculateCyclomaticComplexity(unitText: string): number {
  let complexity = 1;

  for (const pattern of DECISION_POINT_PATTERNS) {
    complexity += (unitText.match(pattern) ?? []).length;
  }

  return complexity;
}
