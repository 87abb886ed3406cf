import { LanguageTag } from '../types';
import { patternsFor } from './language-patterns';

/**
 * Raw span of a function-like unit, before scoring
 */
export interface ExtractedUnit {
  startOffset: number;
  text: string;
}

/**
 * Extract function/method-like spans from one file's text.
 *
 * Units start where the language's signature pattern matches. Brace languages end
 * at the brace balancing the body's opening `{`; a span still open at end of file
 * is dropped. Python units end before the first non-blank line indented no deeper
 * than the `def` line. Nested functions come out as separate, overlapping units.
 */
export function extractCodeUnits(content: string, language: LanguageTag): ExtractedUnit[] {
  const patterns = patternsFor(language);
  const units: ExtractedUnit[] = [];

  for (const match of content.matchAll(patterns.functionSignature)) {
    const start = match.index ?? 0;
    const signatureEnd = start + match[0].length;

    const end =
      patterns.unitBoundary === 'braces'
        ? findBraceUnitEnd(content, match[0], signatureEnd)
        : findIndentedUnitEnd(content, start, signatureEnd);

    if (end !== null) {
      units.push({ startOffset: start, text: content.slice(start, end) });
    }
  }

  return units;
}

/**
 * Exclusive end offset of a brace-delimited unit, or null when the braces never balance
 */
function findBraceUnitEnd(content: string, signature: string, signatureEnd: number): number | null {
  const open = signature.endsWith('{') ? signatureEnd - 1 : content.indexOf('{', signatureEnd);
  if (open < 0) {
    return null;
  }

  let depth = 0;
  for (let i = open; i < content.length; i++) {
    const char = content[i];
    if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }

  return null;
}

/**
 * Exclusive end offset of an indentation-delimited unit (always found; may be end of file)
 */
function findIndentedUnitEnd(content: string, start: number, signatureEnd: number): number {
  const lineStart = content.lastIndexOf('\n', start - 1) + 1;
  const baseIndent = indentationOf(content.slice(lineStart, start));

  let end = lineEndAt(content, signatureEnd);
  let cursor = end + 1;

  while (cursor < content.length) {
    const lineEnd = lineEndAt(content, cursor);
    const line = content.slice(cursor, lineEnd);

    if (line.trim().length > 0) {
      if (indentationOf(line) <= baseIndent) {
        break;
      }
      end = lineEnd;
    }
    cursor = lineEnd + 1;
  }

  return end;
}

function lineEndAt(content: string, offset: number): number {
  const newline = content.indexOf('\n', offset);
  return newline < 0 ? content.length : newline;
}

function indentationOf(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0].length : 0;
}
