import { z } from 'zod';
import { InvalidDrawerConfigError } from './errors';

export const DRAWER_SIDES = ['left', 'right'] as const;
export type DrawerSide = (typeof DRAWER_SIDES)[number];

export interface ViewportSize {
  width: number;
  height: number;
}

/** Picks a drawer width in pixels for the given viewport. */
export type WidthBySize = (size: ViewportSize) => number;

export const DRAWER_CONFIG_DEFAULTS = Object.freeze({
  closeOnClickOutside: true,
  backdropOpacity: 0.4,
  dragEnabled: false,
  maxDragExtent: 300,
  side: 'right',
  animationDuration: 300,
  closeOnEscapeKey: true,
  borderRadius: 20,
  closeOnResume: false,
  closeOnBackButton: false,
  minBackdropExtent: 30,
} as const);

const drawerConfigSchema = z
  .object({
    widthBySize: z
      .custom<WidthBySize>((value) => typeof value === 'function', 'widthBySize must be a function')
      .optional(),
    closeOnClickOutside: z.boolean().default(DRAWER_CONFIG_DEFAULTS.closeOnClickOutside),
    backdropOpacity: z
      .number()
      .min(0, 'backdropOpacity must be between 0 and 1')
      .max(1, 'backdropOpacity must be between 0 and 1')
      .default(DRAWER_CONFIG_DEFAULTS.backdropOpacity),
    dragEnabled: z.boolean().default(DRAWER_CONFIG_DEFAULTS.dragEnabled),
    maxDragExtent: z.number().default(DRAWER_CONFIG_DEFAULTS.maxDragExtent),
    side: z.enum(DRAWER_SIDES).default(DRAWER_CONFIG_DEFAULTS.side),
    animationDuration: z.number().default(DRAWER_CONFIG_DEFAULTS.animationDuration),
    closeOnEscapeKey: z.boolean().default(DRAWER_CONFIG_DEFAULTS.closeOnEscapeKey),
    borderRadius: z
      .number()
      .min(0, 'borderRadius must be greater than or equal to 0')
      .default(DRAWER_CONFIG_DEFAULTS.borderRadius),
    closeOnResume: z.boolean().default(DRAWER_CONFIG_DEFAULTS.closeOnResume),
    closeOnBackButton: z.boolean().default(DRAWER_CONFIG_DEFAULTS.closeOnBackButton),
    maxDrawerExtent: z.number().optional(),
    minBackdropExtent: z.number().default(DRAWER_CONFIG_DEFAULTS.minBackdropExtent),
  })
  .refine((options) => options.closeOnClickOutside || options.closeOnEscapeKey, {
    message: 'closeOnClickOutside and closeOnEscapeKey cannot both be false',
  });

export type DrawerConfigOptions = z.input<typeof drawerConfigSchema>;
export type DrawerConfigValues = z.output<typeof drawerConfigSchema>;

/**
 * Display and behavior options for a {@link Drawer}.
 *
 * Instances are frozen. Use {@link DrawerConfig.copyWith} to derive a changed
 * copy; it validates the merged options the same way the constructor does.
 */
export class DrawerConfig implements DrawerConfigValues {
  /**
   * Width strategy. When unset the drawer is 260px below a 360px viewport,
   * 300px below 600px and 400px otherwise.
   */
  readonly widthBySize?: WidthBySize;
  /** Close when the backdrop is clicked. */
  readonly closeOnClickOutside: boolean;
  readonly backdropOpacity: number;
  /** Allow dragging the panel toward its edge to dismiss it. */
  readonly dragEnabled: boolean;
  /** Furthest the panel follows a drag, in pixels. */
  readonly maxDragExtent: number;
  readonly side: DrawerSide;
  /** Slide and fade duration in milliseconds. */
  readonly animationDuration: number;
  readonly closeOnEscapeKey: boolean;
  readonly borderRadius: number;
  /** Close when the page becomes visible again after being hidden. */
  readonly closeOnResume: boolean;
  /** Close on browser back navigation. */
  readonly closeOnBackButton: boolean;
  /** Upper bound on the panel width, in pixels. */
  readonly maxDrawerExtent?: number;
  /** Backdrop width that always stays visible beside the panel, in pixels. */
  readonly minBackdropExtent: number;

  constructor(options: DrawerConfigOptions = {}) {
    const result = drawerConfigSchema.safeParse(options);
    if (!result.success) {
      throw new InvalidDrawerConfigError(result.error.issues.map((issue) => issue.message));
    }
    const values = result.data;
    this.widthBySize = values.widthBySize;
    this.closeOnClickOutside = values.closeOnClickOutside;
    this.backdropOpacity = values.backdropOpacity;
    this.dragEnabled = values.dragEnabled;
    this.maxDragExtent = values.maxDragExtent;
    this.side = values.side;
    this.animationDuration = values.animationDuration;
    this.closeOnEscapeKey = values.closeOnEscapeKey;
    this.borderRadius = values.borderRadius;
    this.closeOnResume = values.closeOnResume;
    this.closeOnBackButton = values.closeOnBackButton;
    this.maxDrawerExtent = values.maxDrawerExtent;
    this.minBackdropExtent = values.minBackdropExtent;
    Object.freeze(this);
  }

  toOptions(): DrawerConfigValues {
    return {
      widthBySize: this.widthBySize,
      closeOnClickOutside: this.closeOnClickOutside,
      backdropOpacity: this.backdropOpacity,
      dragEnabled: this.dragEnabled,
      maxDragExtent: this.maxDragExtent,
      side: this.side,
      animationDuration: this.animationDuration,
      closeOnEscapeKey: this.closeOnEscapeKey,
      borderRadius: this.borderRadius,
      closeOnResume: this.closeOnResume,
      closeOnBackButton: this.closeOnBackButton,
      maxDrawerExtent: this.maxDrawerExtent,
      minBackdropExtent: this.minBackdropExtent,
    };
  }

  /** Overrides left `undefined` keep the current value. */
  copyWith(overrides: DrawerConfigOptions = {}): DrawerConfig {
    const current = this.toOptions();
    return new DrawerConfig({
      widthBySize: overrides.widthBySize ?? current.widthBySize,
      closeOnClickOutside: overrides.closeOnClickOutside ?? current.closeOnClickOutside,
      backdropOpacity: overrides.backdropOpacity ?? current.backdropOpacity,
      dragEnabled: overrides.dragEnabled ?? current.dragEnabled,
      maxDragExtent: overrides.maxDragExtent ?? current.maxDragExtent,
      side: overrides.side ?? current.side,
      animationDuration: overrides.animationDuration ?? current.animationDuration,
      closeOnEscapeKey: overrides.closeOnEscapeKey ?? current.closeOnEscapeKey,
      borderRadius: overrides.borderRadius ?? current.borderRadius,
      closeOnResume: overrides.closeOnResume ?? current.closeOnResume,
      closeOnBackButton: overrides.closeOnBackButton ?? current.closeOnBackButton,
      maxDrawerExtent: overrides.maxDrawerExtent ?? current.maxDrawerExtent,
      minBackdropExtent: overrides.minBackdropExtent ?? current.minBackdropExtent,
    });
  }

  toString(): string {
    const fields: Array<[string, string]> = [
      ['widthBySize', this.widthBySize ? 'custom' : 'default'],
      ['side', this.side],
      ['closeOnClickOutside', String(this.closeOnClickOutside)],
      ['closeOnEscapeKey', String(this.closeOnEscapeKey)],
      ['closeOnResume', String(this.closeOnResume)],
      ['closeOnBackButton', String(this.closeOnBackButton)],
      ['backdropOpacity', String(this.backdropOpacity)],
      ['dragEnabled', String(this.dragEnabled)],
      ['maxDragExtent', String(this.maxDragExtent)],
      ['animationDuration', `${this.animationDuration}ms`],
      ['borderRadius', String(this.borderRadius)],
      ['maxDrawerExtent', this.maxDrawerExtent === undefined ? 'none' : String(this.maxDrawerExtent)],
      ['minBackdropExtent', String(this.minBackdropExtent)],
    ];
    return `DrawerConfig(\n${fields.map(([name, value]) => `  ${name}: ${value}`).join(',\n')}\n)`;
  }
}

export const DEFAULT_DRAWER_CONFIG = new DrawerConfig();
