export { Drawer, DRAWER_ROOT_ID, type DrawerProps } from './Drawer';
export {
  DrawerConfig,
  DEFAULT_DRAWER_CONFIG,
  DRAWER_CONFIG_DEFAULTS,
  DRAWER_SIDES,
  type DrawerConfigOptions,
  type DrawerConfigValues,
  type DrawerSide,
  type ViewportSize,
  type WidthBySize,
} from './DrawerConfig';
export { InvalidDrawerConfigError, isInvalidDrawerConfigError } from './errors';
export { DRAWER_WIDTH_BREAKPOINTS, DRAWER_WIDTH_WIDE, defaultDrawerWidth, resolveDrawerWidth } from './drawerWidth';
export {
  CLOSE_THRESHOLD,
  MOVEMENT_DEADZONE,
  VELOCITY_THRESHOLD,
  closingDelta,
  dragOffset,
  dragProgress,
  shouldDismissDrag,
} from './drag';
export { HISTORY_MARKER_KEY, useDismissTriggers, useEdgeDrag, useViewportSize, type EdgeDragState } from './hooks';
