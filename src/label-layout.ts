export interface LabelCandidate {
  y: number;
}

export const BADGE_HEIGHT = 18;
export const BADGE_GAP = 4;
export const MIN_LABEL_SEPARATION = BADGE_HEIGHT + BADGE_GAP; // between badge centers
export const MAX_RELAXATION_PASSES = 10;

const PUSH_MARGIN = 0.5;

/**
 * Spreads labels vertically so adjacent centers are at least `minSep` apart.
 * Candidates are sorted once by y, then every overlapping neighbour pair is
 * pushed apart by half the deficit (plus a margin) until a pass moves nothing.
 * Each push is symmetric, so the mean y is unchanged. Input is not modified.
 */
export function spreadLabels<T extends LabelCandidate>(
  items: readonly T[],
  minSep: number = MIN_LABEL_SEPARATION,
  maxPasses: number = MAX_RELAXATION_PASSES
): T[] {
  const placed = items.map(item => ({ item, y: item.y })).sort((a, b) => a.y - b.y);

  if (placed.length > 1) {
    for (let pass = 0; pass < maxPasses; pass++) {
      let moved = false;
      for (let i = 1; i < placed.length; i++) {
        const gap = placed[i].y - placed[i - 1].y;
        if (gap < minSep) {
          const push = (minSep - gap) / 2 + PUSH_MARGIN;
          placed[i - 1].y -= push;
          placed[i].y += push;
          moved = true;
        }
      }
      if (!moved) break;
    }
  }

  return placed.map(({ item, y }) => ({ ...item, y }));
}
