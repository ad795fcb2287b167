import * as log from './util/log';
import { Graph } from './util/graph';
import { topologicalSort } from './util/toposort';
import { DuplicateTargetError, UnknownTargetError } from './errors';
import { PlanExecutor } from './plan-executor';
import { RunContext } from './run-context';
import { StateStore } from './state-store';
import { ExecutionPlan, Target } from './target';

/**
 * All targets of a project and the dependencies between them
 */
export class TargetGraph {
  private readonly targets = new Map<string, Target>();

  public register(target: Target): this {
    if (this.targets.has(target.name)) {
      throw new DuplicateTargetError(target.name);
    }
    this.targets.set(target.name, target);
    return this;
  }

  public registerAll(targets: Iterable<Target>): this {
    for (const target of targets) {
      this.register(target);
    }
    return this;
  }

  public has(name: string) {
    return this.targets.has(name);
  }

  public lookup(name: string): Target {
    const ret = this.targets.get(name);
    if (!ret) { throw new UnknownTargetError(name); }
    return ret;
  }

  /**
   * Registered targets, in registration order
   */
  public list(): Target[] {
    return Array.from(this.targets.values());
  }

  /**
   * The targets that must run for the given target, dependencies first
   *
   * Throws UnknownTargetError if the target or anything it depends on is not
   * registered, and CycleError if the graph contains a cycle anywhere. A cycle
   * reached from the target is reported with the path from the target.
   */
  public resolve(targetName: string): ExecutionPlan {
    this.lookup(targetName);

    const names = topologicalSort([targetName], n => n, n => this.dependenciesOf(n));
    this.toGraph().sorted();
    log.debug(`Plan for ${targetName}: ${names.join(', ')}`);
    return {
      requested: targetName,
      targets: names.map(n => this.lookup(n)),
    };
  }

  /**
   * Every registered target, dependencies first
   *
   * Checks the whole graph, including targets nothing asks for.
   */
  public resolveAll(): Target[] {
    return this.toGraph().sorted().map(n => this.lookup(n));
  }

  /**
   * Run a plan's targets in order
   *
   * Stops at the first failing target and throws a TargetFailedError for it.
   * Whatever the targets before it did stays done.
   */
  public async run(plan: ExecutionPlan, context: RunContext, store: StateStore = new StateStore()): Promise<StateStore> {
    const executor = new PlanExecutor(plan, store);
    await executor.execute(async (target) => {
      context.signal?.throwIfAborted();
      await target.action.execute(context);
    });
    return store;
  }

  public toGraphViz(): string {
    return this.toGraph().toGraphViz();
  }

  /**
   * Edges run from a dependency to the targets that depend on it
   */
  private toGraph(): Graph<string> {
    const graph = new Graph<string>();
    graph.addNode(...this.targets.keys());
    for (const target of this.targets.values()) {
      for (const dep of this.dependenciesOf(target.name)) {
        graph.addEdge(dep, target.name);
      }
    }
    return graph;
  }

  private dependenciesOf(name: string): string[] {
    const target = this.lookup(name);
    for (const dep of target.dependsOn) {
      if (!this.targets.has(dep)) {
        throw new UnknownTargetError(dep, name);
      }
    }
    return Array.from(new Set(target.dependsOn));
  }
}
