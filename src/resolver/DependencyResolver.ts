/**
 * DependencyResolver - Dependency graph over script names.
 *
 * Nodes are keyed case-insensitively. An edge A → B means A requires B to
 * be present first. Names that are referenced but never defined stay in the
 * graph as unresolved nodes.
 */

import { compareNames, nameKey } from '../types/ScriptRecord.js';
import { CycleDetectedError, UnresolvedDependencyError } from '../types/errors.js';

/**
 * Minimal view of a script the graph needs.
 */
export interface GraphInput {
  name: string;
  dependencies: readonly string[];
}

export interface GraphNode {
  /** Canonical spelling (the defining script's name, or the first reference) */
  name: string;
  /** Declared dependencies, canonical spelling */
  dependencies: string[];
  /** Referenced but not defined */
  unresolved: boolean;
}

export interface UnresolvedReport {
  name: string;
  /** Scripts in the requested closure that declare the missing name */
  missingFrom: string[];
}

export interface ResolveOptions {
  /** Omit unresolved names instead of failing */
  partial?: boolean;
}

export interface ResolveResult {
  /** Dependency-first order of the closure of the roots */
  order: string[];
  /** Unresolved names (always empty unless partial) */
  unresolved: UnresolvedReport[];
}

export interface DependencyTreeNode {
  name: string;
  unresolved: boolean;
  /** Node already on the current path; children are not expanded */
  cyclic: boolean;
  children: DependencyTreeNode[];
}

type Mark = 'visiting' | 'done';

/** One node being walked, with the index of its next dependency. */
interface VisitFrame {
  node: GraphNode;
  key: string;
  next: number;
}

export class DependencyGraph {
  private readonly nodes: Map<string, GraphNode>;
  private readonly reverse: Map<string, string[]>;

  private constructor(nodes: Map<string, GraphNode>, reverse: Map<string, string[]>) {
    this.nodes = nodes;
    this.reverse = reverse;
  }

  /**
   * Build the graph from index entries or records. Never fails.
   *
   * Entries are expected to carry unique names; a later duplicate replaces
   * an earlier one.
   */
  static build(entries: readonly GraphInput[]): DependencyGraph {
    const nodes = new Map<string, GraphNode>();
    for (const entry of entries) {
      nodes.set(nameKey(entry.name), { name: entry.name, dependencies: [], unresolved: false });
    }

    const reverse = new Map<string, string[]>();
    for (const entry of entries) {
      const node = nodes.get(nameKey(entry.name));
      if (!node) continue;

      const seen = new Set<string>();
      node.dependencies = [];
      for (const dep of entry.dependencies) {
        const key = nameKey(dep);
        if (key.length === 0 || seen.has(key)) continue;
        seen.add(key);

        let target = nodes.get(key);
        if (!target) {
          target = { name: dep.trim(), dependencies: [], unresolved: true };
          nodes.set(key, target);
        }
        node.dependencies.push(target.name);

        const dependents = reverse.get(key) ?? [];
        dependents.push(node.name);
        reverse.set(key, dependents);
      }
    }

    return new DependencyGraph(nodes, reverse);
  }

  /** Number of nodes, unresolved ones included. */
  get size(): number {
    return this.nodes.size;
  }

  getNode(name: string): GraphNode | undefined {
    return this.nodes.get(nameKey(name));
  }

  /** Whether the name belongs to a defined script. */
  isDefined(name: string): boolean {
    const node = this.getNode(name);
    return node !== undefined && !node.unresolved;
  }

  /** Names referenced somewhere but defined nowhere, sorted. */
  unresolvedNames(): string[] {
    return [...this.nodes.values()]
      .filter((node) => node.unresolved)
      .map((node) => node.name)
      .sort(compareNames);
  }

  /**
   * Order the roots and their transitive dependencies so that every
   * dependency precedes its dependents.
   *
   * Depth-first from the roots in the given order, dependencies in declared
   * order, emitting a node after its dependencies. The same input always
   * gives the same order.
   *
   * @throws CycleDetectedError when the closure contains a cycle (even in
   *   partial mode)
   * @throws UnresolvedDependencyError for the first missing name, unless
   *   `partial` is set
   */
  resolveOrder(rootNames: readonly string[], options: ResolveOptions = {}): ResolveResult {
    const marks = new Map<string, Mark>();
    const path: string[] = [];
    const order: string[] = [];
    const missing = new Map<string, UnresolvedReport>();

    const noteMissing = (name: string, from: string | undefined): void => {
      const key = nameKey(name);
      let report = missing.get(key);
      if (!report) {
        report = { name, missingFrom: [] };
        missing.set(key, report);
      }
      if (from !== undefined && !report.missingFrom.includes(from)) {
        report.missingFrom.push(from);
      }
    };

    // Explicit frame stack: long chains must not exhaust the call stack.
    const stack: VisitFrame[] = [];

    const enter = (name: string, from: string | undefined): void => {
      const key = nameKey(name);
      const node = this.nodes.get(key);

      if (!node || node.unresolved) {
        noteMissing(node?.name ?? name.trim(), from);
        return;
      }

      const mark = marks.get(key);
      if (mark === 'done') return;
      if (mark === 'visiting') {
        const start = path.findIndex((entry) => nameKey(entry) === key);
        throw new CycleDetectedError(path.slice(start));
      }

      marks.set(key, 'visiting');
      path.push(node.name);
      stack.push({ node, key, next: 0 });
    };

    for (const root of rootNames) {
      enter(root, undefined);
      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        if (!frame) break;
        const dep = frame.node.dependencies[frame.next];
        if (dep !== undefined) {
          frame.next += 1;
          enter(dep, frame.node.name);
          continue;
        }
        stack.pop();
        path.pop();
        marks.set(frame.key, 'done');
        order.push(frame.node.name);
      }
    }

    const unresolved = [...missing.values()];
    if (unresolved.length > 0 && !options.partial) {
      const [first] = unresolved;
      if (first) {
        throw new UnresolvedDependencyError(first.name, first.missingFrom);
      }
    }

    return { order, unresolved: options.partial ? unresolved : [] };
  }

  /**
   * Nested view of a script's dependencies. A node that already appears on
   * the path from the root is marked `cyclic` and not expanded again.
   */
  dependencyTree(name: string): DependencyTreeNode {
    const onPath = new Set<string>();
    const stack: Array<{ node: GraphNode; key: string; tree: DependencyTreeNode; next: number }> = [];

    const enter = (current: string): DependencyTreeNode => {
      const key = nameKey(current);
      const node = this.nodes.get(key);
      const displayName = node?.name ?? current.trim();

      if (!node || node.unresolved) {
        return { name: displayName, unresolved: true, cyclic: false, children: [] };
      }
      if (onPath.has(key)) {
        return { name: displayName, unresolved: false, cyclic: true, children: [] };
      }

      const tree: DependencyTreeNode = { name: displayName, unresolved: false, cyclic: false, children: [] };
      onPath.add(key);
      stack.push({ node, key, tree, next: 0 });
      return tree;
    };

    const root = enter(name);
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const dep = frame.node.dependencies[frame.next];
      if (dep === undefined) {
        stack.pop();
        onPath.delete(frame.key);
        continue;
      }
      frame.next += 1;
      frame.tree.children.push(enter(dep));
    }

    return root;
  }

  /**
   * Scripts that declare `name` as a direct dependency, sorted.
   */
  dependents(name: string): string[] {
    return [...(this.reverse.get(nameKey(name)) ?? [])].sort(compareNames);
  }

  /**
   * Every elementary cycle reachable by depth-first search, each reported
   * once, rotated to start at its smallest name. Cycles come out sorted.
   */
  findCycles(): string[][] {
    const marks = new Map<string, Mark>();
    const path: string[] = [];
    const found = new Map<string, string[]>();

    const stack: VisitFrame[] = [];

    const enter = (node: GraphNode): void => {
      const key = nameKey(node.name);
      marks.set(key, 'visiting');
      path.push(node.name);
      stack.push({ node, key, next: 0 });
    };

    const roots = [...this.nodes.values()]
      .filter((node) => !node.unresolved)
      .sort((a, b) => compareNames(a.name, b.name));
    for (const root of roots) {
      if (marks.has(nameKey(root.name))) continue;

      enter(root);
      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        if (!frame) break;
        const dep = frame.node.dependencies[frame.next];
        if (dep === undefined) {
          stack.pop();
          path.pop();
          marks.set(frame.key, 'done');
          continue;
        }
        frame.next += 1;

        const depKey = nameKey(dep);
        const target = this.nodes.get(depKey);
        if (!target || target.unresolved) continue;

        const mark = marks.get(depKey);
        if (mark === 'visiting') {
          const start = path.findIndex((entry) => nameKey(entry) === depKey);
          const cycle = rotateToSmallest(path.slice(start));
          found.set(cycle.map(nameKey).join('\u0000'), cycle);
        } else if (mark === undefined) {
          enter(target);
        }
      }
    }

    return [...found.values()].sort((a, b) => compareNames(a.join(' '), b.join(' ')));
  }
}

function rotateToSmallest(cycle: string[]): string[] {
  let smallest = 0;
  cycle.forEach((name, i) => {
    const current = cycle[smallest];
    if (current !== undefined && compareNames(name, current) < 0) smallest = i;
  });
  return [...cycle.slice(smallest), ...cycle.slice(0, smallest)];
}
