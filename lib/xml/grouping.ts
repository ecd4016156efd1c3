/**
 * "Group with parent" reordering
 *
 * Runs after boundary detection as a separate index-remapping pass. Each entry
 * may name the identifier of a parent entry; the result is a permutation of
 * entry indices where every child follows its parent directly (after the
 * parent's earlier children), and everything else keeps document order.
 *
 * - children of the same parent keep their relative order
 * - a child whose parent is missing stays where it is
 * - entries caught in a parent cycle fall back to document order
 */

export type GroupEntry = {
  identifier?: string;
  /** Identifier of the entry this one should follow */
  parent?: string;
};

function resolveParents(
  entries: readonly GroupEntry[]
): (number | undefined)[] {
  const firstByIdentifier = new Map<string, number>();
  entries.forEach((entry, i) => {
    if (entry.identifier && !firstByIdentifier.has(entry.identifier)) {
      firstByIdentifier.set(entry.identifier, i);
    }
  });

  return entries.map((entry, i) => {
    if (!entry.parent) {
      return undefined;
    }
    const parent = firstByIdentifier.get(entry.parent);
    return parent === i ? undefined : parent;
  });
}

/**
 * Detach every entry that sits on a parent cycle so it is emitted in
 * document order.
 */
function breakCycles(parents: (number | undefined)[]): void {
  // 0 = unvisited, 1 = on the current walk, 2 = done
  const state = new Array<number>(parents.length).fill(0);

  for (let start = 0; start < parents.length; start++) {
    if (state[start] !== 0) {
      continue;
    }
    const walk: number[] = [];
    let current: number | undefined = start;
    while (current !== undefined && state[current] === 0) {
      state[current] = 1;
      walk.push(current);
      current = parents[current];
    }
    if (current !== undefined && state[current] === 1) {
      const cycleStart = walk.indexOf(current);
      for (const member of walk.slice(cycleStart)) {
        parents[member] = undefined;
      }
    }
    for (const visited of walk) {
      state[visited] = 2;
    }
  }
}

/**
 * Output order for a sequence of entries, as indices into `entries`.
 */
export function groupOrder(entries: readonly GroupEntry[]): number[] {
  const parents = resolveParents(entries);
  breakCycles(parents);

  const children = new Map<number, number[]>();
  parents.forEach((parent, i) => {
    if (parent === undefined) {
      return;
    }
    const siblings = children.get(parent);
    if (siblings) {
      siblings.push(i);
    } else {
      children.set(parent, [i]);
    }
  });

  const order: number[] = [];
  const emit = (i: number) => {
    order.push(i);
    for (const child of children.get(i) ?? []) {
      emit(child);
    }
  };
  parents.forEach((parent, i) => {
    if (parent === undefined) {
      emit(i);
    }
  });
  return order;
}
