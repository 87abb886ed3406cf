import * as path from 'path';
import { LanguageTag } from '../types';

/**
 * How the end of a unit is found once its signature matched
 */
export type UnitBoundary = 'braces' | 'indentation';

/**
 * Per-language heuristics. All patterns carry the `g` and `m` flags;
 * `importTargets` patterns capture the imported module in group 1.
 */
export interface LanguagePatterns {
  functionSignature: RegExp;
  unitBoundary: UnitBoundary;
  importStatements: RegExp[];
  importTargets: RegExp[];
}

const GENERIC_SIGNATURE = /\w+\s*\([^)]*\)\s*\{/gm;

const GENERIC_IMPORTS = [/^import\s+/gm, /^#include\s*[<"]/gm];

const SCRIPT_PATTERNS: LanguagePatterns = {
  functionSignature:
    /(function\s+\w+\s*\([^)]*\)\s*\{|(?:const|let|var)\s+\w+\s*=\s*(?:async\s*)?\([^)]*\)\s*=>\s*\{|\w+\s*\([^)]*\)\s*\{)/gm,
  unitBoundary: 'braces',
  importStatements: [/^import\s+.*from\s+['"]/gm, /require\s*\(['"]/gm],
  importTargets: [
    /import.*from\s+['"]\.\.?\/([\w/]+)['"]/gm,
    /require\(['"]\.\.?\/([\w/]+)['"]\)/gm,
  ],
};

const NATIVE_PATTERNS: LanguagePatterns = {
  functionSignature: GENERIC_SIGNATURE,
  unitBoundary: 'braces',
  importStatements: GENERIC_IMPORTS,
  importTargets: [],
};

export const LANGUAGE_PATTERNS: Readonly<Record<LanguageTag, LanguagePatterns>> = {
  csharp: {
    functionSignature:
      /(public|private|protected|internal)\s+(?:static\s+)?(?:async\s+)?\w+(?:<[\w,\s]+>)?\s+\w+\s*\([^)]*\)\s*\{/gm,
    unitBoundary: 'braces',
    importStatements: [/^using\s+[\w.]+;/gm, /^using\s+static\s+[\w.]+;/gm],
    importTargets: [/using\s+([\w.]+);/gm],
  },
  javascript: SCRIPT_PATTERNS,
  typescript: SCRIPT_PATTERNS,
  python: {
    functionSignature: /def\s+\w+\s*\([^)]*\)\s*:/gm,
    unitBoundary: 'indentation',
    importStatements: [/^import\s+[\w.]+/gm, /^from\s+[\w.]+\s+import/gm],
    importTargets: [/from\s+([\w.]+)\s+import/gm, /import\s+([\w.]+)/gm],
  },
  java: {
    functionSignature:
      /(public|private|protected)\s+(?:static\s+)?(?:final\s+)?\w+(?:<[\w,\s]+>)?\s+\w+\s*\([^)]*\)\s*\{/gm,
    unitBoundary: 'braces',
    importStatements: [/^import\s+[\w.]+;/gm],
    importTargets: [/import\s+([\w.]+);/gm],
  },
  go: {
    functionSignature: /func\s+(?:\([\w\s*]+\)\s+)?\w+\s*\([^)]*\)\s*(?:[\w,\s[\]*]+)?\s*\{/gm,
    unitBoundary: 'braces',
    importStatements: [/^import\s+\(/gm, /^import\s+"/gm],
    importTargets: [],
  },
  rust: NATIVE_PATTERNS,
  cpp: NATIVE_PATTERNS,
  c: NATIVE_PATTERNS,
  other: NATIVE_PATTERNS,
};

const EXTENSION_LANGUAGES: Readonly<Record<string, LanguageTag>> = {
  '.cs': 'csharp',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.py': 'python',
  '.java': 'java',
  '.go': 'go',
  '.rs': 'rust',
  '.cpp': 'cpp',
  '.c': 'c',
  '.h': 'c',
};

/**
 * Language tag for a file path or bare extension; unknown extensions fall back to 'other'
 */
export function languageForPath(filePath: string): LanguageTag {
  const extension = /^\.\w+$/.test(filePath) ? filePath : path.extname(filePath);
  return EXTENSION_LANGUAGES[extension.toLowerCase()] ?? 'other';
}

export function patternsFor(language: LanguageTag): LanguagePatterns {
  return LANGUAGE_PATTERNS[language];
}
