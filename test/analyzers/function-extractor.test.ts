import { describe, it, expect } from 'vitest';
import { extractCodeUnits } from '../../src/analyzers/function-extractor';
import { languageForPath } from '../../src/analyzers/language-patterns';

describe('languageForPath', () => {
  it('maps known extensions case-insensitively', () => {
    expect(languageForPath('src/Program.CS')).toBe('csharp');
    expect(languageForPath('lib/util.tsx')).toBe('typescript');
    expect(languageForPath('include/util.h')).toBe('c');
    expect(languageForPath('.py')).toBe('python');
  });

  it('falls back to other for unknown extensions', () => {
    expect(languageForPath('build.gradle')).toBe('other');
  });
});

describe('extractCodeUnits', () => {
  describe('brace languages', () => {
    it('extracts a Java method up to its balancing brace', () => {
      const content = [
        'public class Calculator {',
        '    public int add(int a, int b) {',
        '        return a + b;',
        '    }',
        '}',
      ].join('\n');

      const units = extractCodeUnits(content, 'java');

      expect(units).toHaveLength(1);
      expect(units[0].text).toBe('public int add(int a, int b) {\n        return a + b;\n    }');
      expect(units[0].startOffset).toBe(content.indexOf('public int add'));
    });

    it('drops a unit whose braces never balance', () => {
      const content = 'public void broken() {\n    if (ready) {\n        run();\n';

      expect(extractCodeUnits(content, 'java')).toEqual([]);
    });

    it('extracts arrow functions assigned to a const', () => {
      const content = 'const add = (a: number, b: number) => {\n  return a + b;\n};\n';

      const units = extractCodeUnits(content, 'typescript');

      expect(units).toHaveLength(1);
      expect(units[0].text).toBe('const add = (a: number, b: number) => {\n  return a + b;\n}');
    });

    it('returns nested functions as separate overlapping units', () => {
      const content = [
        'function outer() {',
        '  function inner() {',
        '    return 1;',
        '  }',
        '  return inner();',
        '}',
      ].join('\n');

      const units = extractCodeUnits(content, 'javascript');

      expect(units.map(unit => unit.startOffset)).toEqual([0, content.indexOf('function inner')]);
      expect(units[0].text).toBe(content);
      expect(units[1].text).toBe('function inner() {\n    return 1;\n  }');
    });

    it('uses the generic signature for languages without their own', () => {
      const content = 'int main(void) {\n  return 0;\n}\n';

      const units = extractCodeUnits(content, 'c');

      expect(units).toHaveLength(1);
      expect(units[0].text).toBe('main(void) {\n  return 0;\n}');
    });
  });

  describe('python', () => {
    it('ends a unit before the next line indented no deeper than the def', () => {
      const content = [
        'def outer(x):',
        '    if x:',
        '        return 1',
        '    return 2',
        '',
        'def other():',
        '    pass',
        '',
      ].join('\n');

      const units = extractCodeUnits(content, 'python');

      expect(units.map(unit => unit.text)).toEqual([
        'def outer(x):\n    if x:\n        return 1\n    return 2',
        'def other():\n    pass',
      ]);
    });

    it('extracts nested defs with their own indentation boundary', () => {
      const content = [
        'def outer():',
        '    def inner():',
        '        return 1',
        '    return inner',
      ].join('\n');

      const units = extractCodeUnits(content, 'python');

      expect(units).toHaveLength(2);
      expect(units[0].text).toBe(content);
      expect(units[1].text).toBe('def inner():\n        return 1');
    });
  });

  it('returns nothing for text without signatures', () => {
    expect(extractCodeUnits('# just a comment\n', 'python')).toEqual([]);
    expect(extractCodeUnits('', 'csharp')).toEqual([]);
  });
});
