/**
 * Tests for DependencyResolver module.
 */

import { describe, it, expect } from 'vitest';
import { DependencyGraph, type GraphInput } from './DependencyResolver.js';
import { compareNames } from '../types/ScriptRecord.js';
import { CycleDetectedError, UnresolvedDependencyError } from '../types/errors.js';

function entry(name: string, dependencies: string[] = []): GraphInput {
  return { name, dependencies };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

describe('DependencyGraph', () => {
  describe('build', () => {
    it('marks referenced but undefined names as unresolved', () => {
      const graph = DependencyGraph.build([entry('Q1', ['fn_A', 'fn_Missing']), entry('fn_A')]);

      expect(graph.size).toBe(3);
      expect(graph.isDefined('fn_A')).toBe(true);
      expect(graph.isDefined('fn_Missing')).toBe(false);
      expect(graph.unresolvedNames()).toEqual(['fn_Missing']);
    });

    it('looks names up case-insensitively and keeps the defining spelling', () => {
      const graph = DependencyGraph.build([entry('Q1', ['FN_a']), entry('fn_A')]);

      expect(graph.getNode('q1')?.dependencies).toEqual(['fn_A']);
      expect(graph.unresolvedNames()).toEqual([]);
    });
  });

  describe('resolveOrder', () => {
    it('orders a chain dependency-first', () => {
      const graph = DependencyGraph.build([entry('Final', ['Q1']), entry('Q1', ['fn_A']), entry('fn_A')]);

      expect(graph.resolveOrder(['Final'])).toEqual({ order: ['fn_A', 'Q1', 'Final'], unresolved: [] });
    });

    it('emits a shared dependency once, before every dependent', () => {
      const graph = DependencyGraph.build([
        entry('A', ['B', 'C']),
        entry('B', ['D']),
        entry('C', ['D']),
        entry('D'),
      ]);

      expect(graph.resolveOrder(['A']).order).toEqual(['D', 'B', 'C', 'A']);
    });

    it('follows root order and declared dependency order', () => {
      const graph = DependencyGraph.build([
        entry('A', ['B', 'C']),
        entry('B', ['D']),
        entry('C', ['D']),
        entry('D'),
      ]);

      expect(graph.resolveOrder(['C', 'B']).order).toEqual(['D', 'C', 'B']);
      expect(graph.resolveOrder(['C', 'B']).order).toEqual(['D', 'C', 'B']);
    });

    it('lists a repeated root once', () => {
      const graph = DependencyGraph.build([entry('A', ['B']), entry('B')]);

      expect(graph.resolveOrder(['A', 'b', 'A']).order).toEqual(['B', 'A']);
    });

    it('returns canonical names for case-variant roots', () => {
      const graph = DependencyGraph.build([entry('Final', ['Q1']), entry('Q1')]);

      expect(graph.resolveOrder(['final']).order).toEqual(['Q1', 'Final']);
    });

    it('places every dependency before its dependents', () => {
      const entries = [
        entry('Report', ['Sales', 'Costs']),
        entry('Sales', ['Calendar', 'fn_Clean']),
        entry('Costs', ['Calendar']),
        entry('Calendar', ['fn_Clean']),
        entry('fn_Clean'),
      ];
      const graph = DependencyGraph.build(entries);
      const { order } = graph.resolveOrder(['Report']);

      expect(new Set(order).size).toBe(order.length);
      for (const e of entries) {
        for (const dep of e.dependencies) {
          expect(order.indexOf(dep)).toBeLessThan(order.indexOf(e.name));
        }
      }
    });

    it('reports the nodes of a cycle in path order', () => {
      const graph = DependencyGraph.build([entry('A', ['B']), entry('B', ['C']), entry('C', ['A'])]);

      const err = captureError(() => graph.resolveOrder(['A']));

      expect(err).toBeInstanceOf(CycleDetectedError);
      if (!(err instanceof CycleDetectedError)) return;
      expect(err.cycleNodes).toEqual(['A', 'B', 'C']);
      expect(err.message).toBe('Circular dependency detected: A -> B -> C -> A');
    });

    it('detects a self-dependency', () => {
      const graph = DependencyGraph.build([entry('A', ['A'])]);

      const err = captureError(() => graph.resolveOrder(['A']));

      expect(err).toBeInstanceOf(CycleDetectedError);
      if (!(err instanceof CycleDetectedError)) return;
      expect(err.cycleNodes).toEqual(['A']);
    });

    it('fails on a cycle even in partial mode', () => {
      const graph = DependencyGraph.build([entry('A', ['B']), entry('B', ['A'])]);

      expect(() => graph.resolveOrder(['A'], { partial: true })).toThrow(CycleDetectedError);
    });

    it('prefers the cycle over a missing name', () => {
      const graph = DependencyGraph.build([entry('A', ['Missing', 'B']), entry('B', ['A'])]);

      expect(() => graph.resolveOrder(['A'])).toThrow(CycleDetectedError);
    });

    it('fails on a missing dependency', () => {
      const graph = DependencyGraph.build([entry('Q1', ['fn_A', 'fn_Missing']), entry('fn_A')]);

      const err = captureError(() => graph.resolveOrder(['Q1']));

      expect(err).toBeInstanceOf(UnresolvedDependencyError);
      if (!(err instanceof UnresolvedDependencyError)) return;
      expect(err.missingName).toBe('fn_Missing');
      expect(err.missingFrom).toEqual(['Q1']);
    });

    it('fails on an unknown root with no referrers', () => {
      const graph = DependencyGraph.build([entry('A')]);

      const err = captureError(() => graph.resolveOrder(['Nope']));

      expect(err).toBeInstanceOf(UnresolvedDependencyError);
      if (!(err instanceof UnresolvedDependencyError)) return;
      expect(err.missingFrom).toEqual([]);
      expect(err.message).toBe('Script not found: Nope');
    });

    it('omits missing names in partial mode and reports them', () => {
      const graph = DependencyGraph.build([
        entry('Q1', ['fn_A', 'fn_Missing']),
        entry('Q2', ['fn_Missing']),
        entry('fn_A'),
      ]);

      expect(graph.resolveOrder(['Q1', 'Q2'], { partial: true })).toEqual({
        order: ['fn_A', 'Q1', 'Q2'],
        unresolved: [{ name: 'fn_Missing', missingFrom: ['Q1', 'Q2'] }],
      });
    });
  });

  describe('dependencyTree', () => {
    it('nests dependencies and marks cycles and missing names', () => {
      const graph = DependencyGraph.build([entry('A', ['B', 'X']), entry('B', ['A'])]);

      expect(graph.dependencyTree('a')).toEqual({
        name: 'A',
        unresolved: false,
        cyclic: false,
        children: [
          {
            name: 'B',
            unresolved: false,
            cyclic: false,
            children: [{ name: 'A', unresolved: false, cyclic: true, children: [] }],
          },
          { name: 'X', unresolved: true, cyclic: false, children: [] },
        ],
      });
    });

    it('expands a shared dependency under each parent', () => {
      const graph = DependencyGraph.build([entry('A', ['B', 'C']), entry('B', ['D']), entry('C', ['D']), entry('D')]);
      const tree = graph.dependencyTree('A');

      expect(tree.children.map((child) => child.children.map((grandchild) => grandchild.name))).toEqual([['D'], ['D']]);
    });
  });

  describe('dependents', () => {
    it('lists direct dependents sorted', () => {
      const graph = DependencyGraph.build([entry('Q2', ['fn_A']), entry('Q1', ['fn_A']), entry('fn_A')]);

      expect(graph.dependents('FN_A')).toEqual(['Q1', 'Q2']);
      expect(graph.dependents('Q1')).toEqual([]);
    });
  });

  describe('findCycles', () => {
    it('reports each cycle once', () => {
      const graph = DependencyGraph.build([
        entry('B', ['A']),
        entry('A', ['B']),
        entry('C', ['C']),
        entry('D', ['E']),
        entry('E'),
      ]);

      expect(graph.findCycles()).toEqual([['A', 'B'], ['C']]);
    });

    it('returns nothing for an acyclic graph', () => {
      const graph = DependencyGraph.build([entry('A', ['B']), entry('B')]);

      expect(graph.findCycles()).toEqual([]);
    });
  });

  describe('long chains', () => {
    const LENGTH = 10_000;

    // n0 -> n1 -> ... -> n9999, the last one depending on `tail`
    function chain(tail: string[] = []): GraphInput[] {
      return Array.from({ length: LENGTH }, (_, i) =>
        entry(`n${i}`, i + 1 < LENGTH ? [`n${i + 1}`] : tail)
      );
    }

    it('resolves a deep chain without exhausting the stack', () => {
      const { order } = DependencyGraph.build(chain()).resolveOrder(['n0']);

      expect(order).toHaveLength(LENGTH);
      expect(order[0]).toBe('n9999');
      expect(order[LENGTH - 1]).toBe('n0');
    });

    it('attributes a missing name at the end of a deep chain', () => {
      const result = DependencyGraph.build(chain(['gone'])).resolveOrder(['n0'], { partial: true });

      expect(result.order).toHaveLength(LENGTH);
      expect(result.unresolved).toEqual([{ name: 'gone', missingFrom: ['n9999'] }]);
    });

    it('reports a cycle closing a deep chain with its full path', () => {
      const err = captureError(() => DependencyGraph.build(chain(['n0'])).resolveOrder(['n0']));

      expect(err).toBeInstanceOf(CycleDetectedError);
      const cycleNodes = err instanceof CycleDetectedError ? err.cycleNodes : [];
      expect(cycleNodes).toHaveLength(LENGTH);
      expect(cycleNodes[0]).toBe('n0');
      expect(cycleNodes[LENGTH - 1]).toBe('n9999');
    });

    it('builds the tree of a deep chain', () => {
      let node = DependencyGraph.build(chain()).dependencyTree('n0');
      let depth = 1;
      while (node.children.length > 0) {
        const [child] = node.children;
        if (!child) break;
        node = child;
        depth += 1;
      }

      expect(depth).toBe(LENGTH);
      expect(node.name).toBe('n9999');
    });

    it('finds the cycle closing a deep chain', () => {
      const cycles = DependencyGraph.build(chain(['n0'])).findCycles();

      expect(cycles).toHaveLength(1);
      expect(cycles[0]).toHaveLength(LENGTH);
      expect(cycles[0]?.[0]).toBe('n0');
    });
  });

  it('compareNames orders case-insensitively', () => {
    expect(['b', 'A', 'a', 'C'].sort(compareNames)).toEqual(['A', 'a', 'b', 'C']);
  });
});
