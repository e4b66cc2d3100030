import type { DrawerSide } from './DrawerConfig';

/** Share of the draggable span past which a release closes the drawer. */
export const CLOSE_THRESHOLD = 0.4;
/** px/ms toward the edge that counts as a fling. */
export const VELOCITY_THRESHOLD = 0.5;
/** px of travel before a press turns into a drag. */
export const MOVEMENT_DEADZONE = 8;

/** Signed horizontal delta projected onto the closing direction of `side`. */
export function closingDelta(deltaX: number, side: DrawerSide): number {
  return side === 'right' ? deltaX : -deltaX;
}

export function dragOffset(deltaX: number, side: DrawerSide, maxDragExtent: number): number {
  return Math.min(Math.max(closingDelta(deltaX, side), 0), Math.max(maxDragExtent, 0));
}

export function dragProgress(offset: number, panelWidth: number, maxDragExtent: number): number {
  const span = Math.min(panelWidth, maxDragExtent);
  if (span <= 0) return 0;
  return Math.min(Math.max(offset / span, 0), 1);
}

export function shouldDismissDrag(progress: number, velocity: number): boolean {
  return progress >= CLOSE_THRESHOLD || velocity >= VELOCITY_THRESHOLD;
}
