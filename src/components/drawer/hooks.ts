import React, { useEffect, useLayoutEffect, useRef, useState } from 'react';
import type { DrawerConfig, DrawerSide, ViewportSize } from './DrawerConfig';
import { MOVEMENT_DEADZONE, closingDelta, dragOffset, dragProgress, shouldDismissDrag } from './drag';

export function useLockBodyScroll(active: boolean) {
  useLayoutEffect(() => {
    if (!active) return;
    const prev = document.documentElement.style.overflow;
    document.documentElement.style.overflow = 'hidden';
    return () => { document.documentElement.style.overflow = prev; };
  }, [active]);
}

const FOCUSABLE_SELECTORS = [
  'a[href]',
  'button:not([disabled])',
  'input:not([disabled])',
  'select:not([disabled])',
  'textarea:not([disabled])',
  '[tabindex]:not([tabindex="-1"])',
].join(',');

/**
 * Keeps Tab cycling inside the container while active, and hands focus back
 * to whatever held it before once the trap is released.
 */
export function useFocusTrap(
  containerRef: React.RefObject<HTMLElement>,
  active: boolean,
  initialFocusRef?: React.RefObject<HTMLElement>
) {
  useEffect(() => {
    if (!active) return;
    const container = containerRef.current;
    if (!container) return;

    const returnFocusTo = document.activeElement instanceof HTMLElement ? document.activeElement : null;
    const focusables = () => Array.from(container.querySelectorAll<HTMLElement>(FOCUSABLE_SELECTORS))
      .filter(el => el.tabIndex !== -1 && !el.hasAttribute('inert'));

    (initialFocusRef?.current ?? focusables()[0] ?? container).focus();

    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key !== 'Tab') return;
      const list = focusables();
      if (list.length === 0) {
        e.preventDefault();
        container.focus();
        return;
      }
      const edge = e.shiftKey ? list[0] : list[list.length - 1];
      if (document.activeElement !== edge) return;
      e.preventDefault();
      (e.shiftKey ? list[list.length - 1] : list[0]).focus();
    };

    container.addEventListener('keydown', onKeyDown);
    return () => {
      container.removeEventListener('keydown', onKeyDown);
      if (returnFocusTo?.isConnected) returnFocusTo.focus();
    };
  }, [containerRef, active, initialFocusRef]);
}

function readViewport(): ViewportSize {
  return { width: window.innerWidth, height: window.innerHeight };
}

export function useViewportSize(): ViewportSize {
  const [size, setSize] = useState<ViewportSize>(readViewport);

  useEffect(() => {
    const update = () => setSize(readViewport());
    window.addEventListener('resize', update);
    window.addEventListener('orientationchange', update);
    return () => {
      window.removeEventListener('resize', update);
      window.removeEventListener('orientationchange', update);
    };
  }, []);

  return size;
}

export const HISTORY_MARKER_KEY = '__drawer';
let historyMarkerSeq = 0;

function readHistoryMarker(state: unknown): string | undefined {
  if (typeof state !== 'object' || state === null) return undefined;
  const marker: unknown = Reflect.get(state, HISTORY_MARKER_KEY);
  return typeof marker === 'string' ? marker : undefined;
}

/**
 * Wires the keyboard, history and visibility triggers the config enables.
 * Backdrop clicks are handled by the component itself.
 */
export function useDismissTriggers(config: DrawerConfig, active: boolean, onClose: () => void) {
  const { closeOnEscapeKey, closeOnBackButton, closeOnResume } = config;

  useEffect(() => {
    if (!active || !closeOnEscapeKey) return;
    const onKey = (e: KeyboardEvent) => {
      if (e.key === 'Escape') onClose();
    };
    document.addEventListener('keydown', onKey);
    return () => document.removeEventListener('keydown', onKey);
  }, [active, closeOnEscapeKey, onClose]);

  // A marker history entry gives Back something to pop besides the page.
  useEffect(() => {
    if (!active || !closeOnBackButton) return;
    const marker = `drawer-${++historyMarkerSeq}`;
    let consumed = false;
    window.history.pushState({ [HISTORY_MARKER_KEY]: marker }, '');

    const onPopState = (e: PopStateEvent) => {
      if (readHistoryMarker(e.state) === marker) return;
      consumed = true;
      onClose();
    };

    window.addEventListener('popstate', onPopState);
    return () => {
      window.removeEventListener('popstate', onPopState);
      if (!consumed && readHistoryMarker(window.history.state) === marker) window.history.back();
    };
  }, [active, closeOnBackButton, onClose]);

  useEffect(() => {
    if (!active || !closeOnResume) return;
    let wasHidden = false;
    const onVisibility = () => {
      if (document.visibilityState === 'hidden') {
        wasHidden = true;
      } else if (document.visibilityState === 'visible' && wasHidden) {
        wasHidden = false;
        onClose();
      }
    };
    document.addEventListener('visibilitychange', onVisibility);
    return () => document.removeEventListener('visibilitychange', onVisibility);
  }, [active, closeOnResume, onClose]);
}

export interface EdgeDragState {
  isDragging: boolean;
  offset: number;
  progress: number;
}

const IDLE_DRAG: EdgeDragState = { isDragging: false, offset: 0, progress: 0 };

/** Drag-to-dismiss along the horizontal axis, bounded by `maxDragExtent`. */
export function useEdgeDrag(
  panelRef: React.RefObject<HTMLElement>,
  side: DrawerSide,
  maxDragExtent: number,
  active: boolean,
  onClose: () => void
): EdgeDragState {
  const [dragState, setDragState] = useState<EdgeDragState>(IDLE_DRAG);
  const onCloseRef = useRef(onClose);
  onCloseRef.current = onClose;

  useEffect(() => {
    if (!active) return;
    const panel = panelRef.current;
    if (!panel) return;

    const ref = {
      pointerId: null as number | null,
      startX: 0,
      lastX: 0,
      lastTime: 0,
      velocity: 0,
      committed: false,
      offset: 0,
      progress: 0,
    };

    function onPointerDown(e: PointerEvent) {
      if (!(e.target instanceof Element)) return;
      if (e.target.closest('button, a, [role="button"], input, select, textarea')) return;
      ref.pointerId = e.pointerId;
      ref.startX = e.clientX;
      ref.lastX = e.clientX;
      ref.lastTime = e.timeStamp;
      ref.velocity = 0;
      ref.committed = false;
    }

    function onPointerMove(e: PointerEvent) {
      if (ref.pointerId !== e.pointerId || !panel) return;
      const totalDelta = e.clientX - ref.startX;

      const elapsed = Math.max(1, e.timeStamp - ref.lastTime);
      ref.velocity = closingDelta(e.clientX - ref.lastX, side) / elapsed;
      ref.lastX = e.clientX;
      ref.lastTime = e.timeStamp;

      if (!ref.committed) {
        if (Math.abs(totalDelta) < MOVEMENT_DEADZONE) return;
        ref.committed = true;
        panel.setPointerCapture(e.pointerId);
      }

      ref.offset = dragOffset(totalDelta, side, maxDragExtent);
      ref.progress = dragProgress(ref.offset, panel.getBoundingClientRect().width, maxDragExtent);
      setDragState({ isDragging: true, offset: ref.offset, progress: ref.progress });
    }

    function resetDragState() {
      ref.pointerId = null;
      ref.committed = false;
      ref.offset = 0;
      ref.progress = 0;
      setDragState(IDLE_DRAG);
    }

    function onPointerUp(e: PointerEvent) {
      if (ref.pointerId !== e.pointerId) return;
      const dismiss = ref.committed && shouldDismissDrag(ref.progress, ref.velocity);
      resetDragState();
      if (dismiss) onCloseRef.current();
    }

    function onPointerCancel(e: PointerEvent) {
      if (ref.pointerId === e.pointerId) resetDragState();
    }

    panel.addEventListener('pointerdown', onPointerDown);
    panel.addEventListener('pointermove', onPointerMove);
    panel.addEventListener('pointerup', onPointerUp);
    panel.addEventListener('pointercancel', onPointerCancel);
    return () => {
      panel.removeEventListener('pointerdown', onPointerDown);
      panel.removeEventListener('pointermove', onPointerMove);
      panel.removeEventListener('pointerup', onPointerUp);
      panel.removeEventListener('pointercancel', onPointerCancel);
      // A drawer closed mid-drag must reopen at rest.
      resetDragState();
    };
  }, [panelRef, side, maxDragExtent, active]);

  return dragState;
}
