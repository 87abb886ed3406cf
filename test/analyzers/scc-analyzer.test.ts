import { describe, it, expect, beforeEach } from 'vitest';
import { SCCAnalyzer } from '../../src/analyzers/scc-analyzer';
import { DependencyGraph } from '../../src/types';

const graphOf = (entries: Array<[string, string[]]>): DependencyGraph => new Map(entries);

describe('SCCAnalyzer', () => {
  let analyzer: SCCAnalyzer;

  beforeEach(() => {
    analyzer = new SCCAnalyzer();
  });

  describe('findStronglyConnectedComponents', () => {
    it('should give every node of an acyclic graph its own component, dependencies first', () => {
      const result = analyzer.findStronglyConnectedComponents(
        graphOf([
          ['a', ['b']],
          ['b', ['c']],
          ['c', []],
        ])
      );

      expect(result.components.map(c => c.nodes)).toEqual([['c'], ['b'], ['a']]);
      expect(result.components.map(c => c.id)).toEqual(['scc-1', 'scc-2', 'scc-3']);
      expect(result.totalComponents).toBe(3);
      expect(result.cyclicComponents).toHaveLength(0);
      expect(result.largestComponentSize).toBe(1);
    });

    it('should mark a self-import as a cyclic component', () => {
      const result = analyzer.findStronglyConnectedComponents(graphOf([['a', ['a']]]));

      expect(result.components).toHaveLength(1);
      expect(result.components[0].isSelfDependent).toBe(true);
      expect(result.components[0].internalEdges).toBe(1);
      expect(result.cyclicComponents).toHaveLength(1);
    });

    it('should group mutually dependent files', () => {
      const result = analyzer.findStronglyConnectedComponents(
        graphOf([
          ['a', ['b']],
          ['b', ['a']],
          ['c', ['a']],
        ])
      );

      expect(result.totalComponents).toBe(2);
      expect(result.largestComponentSize).toBe(2);
      expect([...result.components[0].nodes].sort()).toEqual(['a', 'b']);
      expect(result.components[0].internalEdges).toBe(2);
      expect(result.components[0].isSelfDependent).toBe(false);
      expect(result.componentMap.get('a')).toBe('scc-1');
      expect(result.componentMap.get('b')).toBe('scc-1');
      expect(result.componentMap.get('c')).toBe('scc-2');
    });

    it('should treat edge targets without an entry as sink nodes', () => {
      const result = analyzer.findStronglyConnectedComponents(graphOf([['a', ['x']]]));

      expect(result.components.map(c => c.nodes)).toEqual([['x'], ['a']]);
    });

    it('should handle an empty graph', () => {
      const result = analyzer.findStronglyConnectedComponents(new Map());

      expect(result.totalComponents).toBe(0);
      expect(result.largestComponentSize).toBe(0);
    });

    it('should reset state between runs', () => {
      analyzer.findStronglyConnectedComponents(graphOf([['a', ['b']], ['b', []]]));
      const result = analyzer.findStronglyConnectedComponents(graphOf([['z', []]]));

      expect(result.components.map(c => c.nodes)).toEqual([['z']]);
    });
  });

  describe('calculateCondensationGraph', () => {
    it('should connect components and drop edges inside a component', () => {
      const { result, edges } = analyzer.calculateCondensationGraph(
        graphOf([
          ['a', ['b']],
          ['b', ['a', 'c']],
          ['c', []],
        ])
      );

      const abId = result.componentMap.get('a');
      const cId = result.componentMap.get('c');
      expect(abId).toBeDefined();
      expect(cId).toBeDefined();
      expect([...(edges.get(abId ?? '') ?? [])]).toEqual([cId]);
      expect([...(edges.get(cId ?? '') ?? [])]).toEqual([]);
    });
  });
});
