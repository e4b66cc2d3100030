import { afterEach, describe, expect, it, vi } from 'vitest';
import { DrawerConfig } from './DrawerConfig';
import { defaultDrawerWidth, resolveDrawerWidth } from './drawerWidth';

describe('defaultDrawerWidth', () => {
  it.each([
    [0, 260],
    [320, 260],
    [359, 260],
    [360, 300],
    [599, 300],
    [600, 400],
    [1920, 400],
  ])('maps viewport width %s to %s', (viewportWidth, expected) => {
    expect(defaultDrawerWidth(viewportWidth)).toBe(expected);
  });
});

describe('resolveDrawerWidth', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const desktop = { width: 1280, height: 800 };

  it('uses the breakpoint default without a strategy', () => {
    expect(resolveDrawerWidth(new DrawerConfig(), desktop)).toBe(400);
    expect(resolveDrawerWidth(new DrawerConfig(), { width: 480, height: 800 })).toBe(300);
  });

  it('passes the viewport to the strategy', () => {
    const widthBySize = vi.fn((size: { width: number; height: number }) => size.width * 0.25);
    expect(resolveDrawerWidth(new DrawerConfig({ widthBySize }), desktop)).toBe(320);
    expect(widthBySize).toHaveBeenCalledWith(desktop);
  });

  it('caps the width at maxDrawerExtent', () => {
    const config = new DrawerConfig({ widthBySize: () => 900, maxDrawerExtent: 600 });
    expect(resolveDrawerWidth(config, desktop)).toBe(600);
  });

  it('keeps minBackdropExtent of backdrop visible', () => {
    expect(resolveDrawerWidth(new DrawerConfig(), { width: 280, height: 600 })).toBe(250);
    const config = new DrawerConfig({ widthBySize: (size) => size.width, minBackdropExtent: 80 });
    expect(resolveDrawerWidth(config, desktop)).toBe(1200);
  });

  it('never goes below zero', () => {
    const config = new DrawerConfig({ minBackdropExtent: 500 });
    expect(resolveDrawerWidth(config, { width: 300, height: 600 })).toBe(0);
  });

  it('falls back to the default and warns on an unusable strategy result', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = new DrawerConfig({ widthBySize: () => Number.NaN });
    expect(resolveDrawerWidth(config, desktop)).toBe(400);
    expect(warn).toHaveBeenCalledWith(
      '[WARN] [drawer] widthBySize returned an unusable width, using the default {"requested":null,"fallback":400}'
    );
  });

  it('rejects negative strategy results', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = new DrawerConfig({ widthBySize: () => -10 });
    expect(resolveDrawerWidth(config, { width: 500, height: 800 })).toBe(300);
  });
});
