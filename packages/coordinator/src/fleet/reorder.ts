/**
 * Reorder Engine - moves the selected entries within the fleet order.
 *
 * Pure functions over (ids, selected). Entries never change order relative
 * to each other except as the move requires, and a move with nothing to do
 * returns the list unchanged.
 */

export type MoveDirection = "top" | "up" | "down" | "bottom";

/**
 * Selected entries become a contiguous block at the top, in their existing
 * relative order; the rest follow in theirs.
 */
export function moveTop(ids: readonly string[], selected: ReadonlySet<string>): string[] {
  return [...ids.filter((id) => selected.has(id)), ...ids.filter((id) => !selected.has(id))];
}

/**
 * Mirror of moveTop.
 */
export function moveBottom(ids: readonly string[], selected: ReadonlySet<string>): string[] {
  return [...ids.filter((id) => !selected.has(id)), ...ids.filter((id) => selected.has(id))];
}

/**
 * Each maximal run of selected entries trades places with the single
 * unselected entry just above it. A run already at position 0 stays put.
 */
export function moveUp(ids: readonly string[], selected: ReadonlySet<string>): string[] {
  const out = [...ids];
  let i = 0;
  while (i < out.length) {
    if (!selected.has(out[i])) {
      i++;
      continue;
    }
    let end = i;
    while (end + 1 < out.length && selected.has(out[end + 1])) end++;

    if (i > 0) {
      const [above] = out.splice(i - 1, 1);
      out.splice(end, 0, above);
    }
    i = end + 1;
  }
  return out;
}

/**
 * Mirror of moveUp: runs trade places with the entry just below them.
 */
export function moveDown(ids: readonly string[], selected: ReadonlySet<string>): string[] {
  const out = [...ids];
  let i = out.length - 1;
  while (i >= 0) {
    if (!selected.has(out[i])) {
      i--;
      continue;
    }
    let start = i;
    while (start - 1 >= 0 && selected.has(out[start - 1])) start--;

    if (i < out.length - 1) {
      const [below] = out.splice(i + 1, 1);
      out.splice(start, 0, below);
    }
    i = start - 1;
  }
  return out;
}

const MOVES: Record<MoveDirection, (ids: readonly string[], selected: ReadonlySet<string>) => string[]> = {
  top: moveTop,
  up: moveUp,
  down: moveDown,
  bottom: moveBottom,
};

export function applyMove(
  direction: MoveDirection,
  ids: readonly string[],
  selected: ReadonlySet<string>
): string[] {
  return MOVES[direction](ids, selected);
}

/**
 * True when some unselected entry sits above a selected one, i.e. the
 * selection is not already the topmost contiguous block.
 */
export function canMoveUp(ids: readonly string[], selected: ReadonlySet<string>): boolean {
  let sawUnselected = false;
  for (const id of ids) {
    if (!selected.has(id)) {
      sawUnselected = true;
    } else if (sawUnselected) {
      return true;
    }
  }
  return false;
}

/**
 * Mirror of canMoveUp.
 */
export function canMoveDown(ids: readonly string[], selected: ReadonlySet<string>): boolean {
  let sawUnselected = false;
  for (let i = ids.length - 1; i >= 0; i--) {
    if (!selected.has(ids[i])) {
      sawUnselected = true;
    } else if (sawUnselected) {
      return true;
    }
  }
  return false;
}
