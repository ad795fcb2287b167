import { CycleError } from '../errors';

/**
 * Sort elements so that every element comes after the elements it depends on
 *
 * Depth-first, so the order is stable: elements are visited in the order
 * given, and their dependencies in the order `depFn` returns them.
 *
 * Throws a CycleError naming the elements on the first cycle found.
 */
export function topologicalSort<T, K>(xs: Iterable<T>, keyFn: (x: T) => K, depFn: (x: T) => Iterable<T>): T[] {
  const ret = new Array<T>();
  const done = new Set<K>();
  const path = new Array<T>();
  const onPath = new Set<K>();

  const visit = (x: T) => {
    const key = keyFn(x);
    if (done.has(key)) { return; }
    if (onPath.has(key)) {
      const start = path.findIndex(p => keyFn(p) === key);
      throw new CycleError([...path.slice(start), x].map(p => `${p}`));
    }

    path.push(x);
    onPath.add(key);
    for (const dep of depFn(x)) {
      visit(dep);
    }
    path.pop();
    onPath.delete(key);

    done.add(key);
    ret.push(x);
  };

  for (const x of xs) {
    visit(x);
  }
  return ret;
}
