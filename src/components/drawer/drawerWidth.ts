import { createLogger } from '../../lib/logger';
import type { DrawerConfig, ViewportSize } from './DrawerConfig';

const log = createLogger('drawer');

/** Viewport breakpoints for the default drawer width, narrowest first. */
export const DRAWER_WIDTH_BREAKPOINTS = [
  { below: 360, width: 260 },
  { below: 600, width: 300 },
] as const;

export const DRAWER_WIDTH_WIDE = 400;

export function defaultDrawerWidth(viewportWidth: number): number {
  for (const breakpoint of DRAWER_WIDTH_BREAKPOINTS) {
    if (viewportWidth < breakpoint.below) return breakpoint.width;
  }
  return DRAWER_WIDTH_WIDE;
}

/**
 * Width the panel renders at: the configured strategy (or the breakpoint
 * default), capped by `maxDrawerExtent`, then narrowed so `minBackdropExtent`
 * pixels of backdrop stay visible.
 */
export function resolveDrawerWidth(config: DrawerConfig, viewport: ViewportSize): number {
  let width = defaultDrawerWidth(viewport.width);
  if (config.widthBySize) {
    const requested = config.widthBySize(viewport);
    if (Number.isFinite(requested) && requested >= 0) {
      width = requested;
    } else {
      log.warn('widthBySize returned an unusable width, using the default', { requested, fallback: width });
    }
  }
  if (config.maxDrawerExtent !== undefined) {
    width = Math.min(width, config.maxDrawerExtent);
  }
  return Math.max(0, Math.min(width, viewport.width - config.minBackdropExtent));
}
