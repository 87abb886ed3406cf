import { LanguageTag } from '../types';
import { patternsFor } from './language-patterns';

/**
 * Coupling estimate for one file: number of import/include-like statements
 */
export function countImports(content: string, language: LanguageTag): number {
  let count = 0;

  for (const pattern of patternsFor(language).importStatements) {
    count += (content.match(pattern) ?? []).length;
  }

  return count;
}

/**
 * Module strings referenced by the file's import statements, in source order.
 * Only languages whose target patterns carry a capture group produce targets.
 */
export function extractImportTargets(content: string, language: LanguageTag): string[] {
  const found: Array<{ offset: number; target: string }> = [];

  for (const pattern of patternsFor(language).importTargets) {
    for (const match of content.matchAll(pattern)) {
      const target = match[1];
      if (target) {
        found.push({ offset: match.index ?? 0, target });
      }
    }
  }

  // Array.prototype.sort is stable, so equal offsets keep pattern order
  return found.sort((a, b) => a.offset - b.offset).map(entry => entry.target);
}
