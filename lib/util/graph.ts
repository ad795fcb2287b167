import { topologicalSort } from './toposort';

/**
 * Directed graph
 *
 * An edge runs from a node to the nodes that need it.
 */
export class Graph<A> {
  private readonly _nodes = new Set<A>();
  private readonly _outgoing = new Map<A, A[]>();
  private readonly _incoming = new Map<A, A[]>();

  public nodes(): Array<A> {
    return Array.from(this._nodes);
  }

  public addNode(...nodes: A[]) {
    for (const node of nodes) {
      this._nodes.add(node);
    }
  }

  public addEdge(from: A, to: A) {
    if (!this._nodes.has(from)) {
      throw new Error(`FROM node is not in Graph: ${from}`);
    }
    if (!this._nodes.has(to)) {
      throw new Error(`TO node is not in Graph: ${to}`);
    }

    pushTo(this._outgoing, from, to);
    pushTo(this._incoming, to, from);
  }

  public predecessors(x: A): A[] {
    return this._incoming.get(x) ?? [];
  }

  public* edges(): IterableIterator<[A, A]> {
    for (const [from, tos] of this._outgoing) {
      for (const to of tos) {
        yield [from, to];
      }
    }
  }

  /**
   * All nodes, every node after its predecessors
   *
   * Throws a CycleError if there is a cycle.
   */
  public sorted(): A[] {
    return topologicalSort(this._nodes, x => x, x => this.predecessors(x));
  }

  public toGraphViz(): string {
    const ret = new Array<string>();
    ret.push('digraph G {');
    ret.push('  rankdir=LR;');
    ret.push('  node [shape = rectangle];');
    for (const node of this.nodes()) {
      ret.push(`  "${node}";`);
    }
    for (const [from, too] of this.edges()) {
      ret.push(`  "${from}" -> "${too}";`);
    }
    ret.push('}');
    return ret.join('\n');
  }
}

function pushTo<A>(map: Map<A, A[]>, key: A, value: A) {
  const existing = map.get(key);
  if (existing) {
    existing.push(value);
  } else {
    map.set(key, [value]);
  }
}
