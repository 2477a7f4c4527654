/**
 * display/geometry.ts
 *
 * Reads back where xrandr actually put an output, so a freshly applied
 * preset can be checked against the live layout.
 */

import { Geometry, Output, Relation } from '../core/types';

export type Placement = Relation | 'below' | 'overlapping';

/** Position of `subject` relative to `anchor`, judged on edges. */
export function relativePlacement(subject: Geometry, anchor: Geometry): Placement {
  if (subject.x === anchor.x && subject.y === anchor.y) return 'same-as';
  if (subject.x + subject.width <= anchor.x) return 'left-of';
  if (subject.x >= anchor.x + anchor.width) return 'right-of';
  if (subject.y + subject.height <= anchor.y) return 'above';
  if (subject.y >= anchor.y + anchor.height) return 'below';
  return 'overlapping';
}

/**
 * Placement of the named output relative to the anchor, or undefined
 * when either one is missing from the inventory or currently disabled.
 */
export function placementOf(outputs: readonly Output[], subject: string, anchor: string): Placement | undefined {
  const subjectGeometry = outputs.find(o => o.name === subject)?.geometry;
  const anchorGeometry = outputs.find(o => o.name === anchor)?.geometry;
  if (!subjectGeometry || !anchorGeometry) return undefined;
  return relativePlacement(subjectGeometry, anchorGeometry);
}
