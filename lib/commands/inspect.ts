import { ExecutionPlan, Target } from '../target';

export function formatPlan(plan: ExecutionPlan): string {
  const width = Math.max(0, ...plan.targets.map(t => t.name.length));
  return plan.targets
    .map((t, i) => `${i + 1}. ${t.name.padEnd(width)}  ${t.action.describe()}`)
    .join('\n');
}

/**
 * One block per target: name, what it depends on, and its description if it has one
 */
export function formatTargets(targets: Target[]): string {
  const ret = new Array<string>();
  for (const t of targets) {
    ret.push(t.dependsOn.length > 0 ? `${t.name} <- ${t.dependsOn.join(', ')}` : t.name);
    if (t.description) {
      ret.push(`    ${t.description}`);
    }
  }
  return ret.join('\n');
}
