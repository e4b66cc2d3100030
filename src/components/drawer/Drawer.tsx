'use client';

import React, { useCallback, useEffect, useRef, useState } from 'react';
import ReactDOM from 'react-dom';
import { DEFAULT_DRAWER_CONFIG, type DrawerConfig } from './DrawerConfig';
import { resolveDrawerWidth } from './drawerWidth';
import { useDismissTriggers, useEdgeDrag, useFocusTrap, useLockBodyScroll, useViewportSize } from './hooks';

export const DRAWER_ROOT_ID = 'drawer-root';
/** Delay before the enter transition starts, so the closed position paints first. */
const ENTER_FRAME_DELAY = 16;

export interface DrawerProps {
  open: boolean;
  onClose: () => void;
  config?: DrawerConfig;
  trapFocus?: boolean;
  initialFocusRef?: React.RefObject<HTMLElement>;
  className?: string;
  backdropClassName?: string;
  panelClassName?: string;
  'aria-label'?: string;
  'aria-labelledby'?: string;
  'aria-describedby'?: string;
  children?: React.ReactNode;
}

type ClassToken = string | false | undefined;

/** BEM block plus `block--modifier` for every truthy modifier, then extra classes. */
function drawerClassName(block: string, modifiers: ClassToken[], ...extra: ClassToken[]): string {
  const mods = modifiers.filter((m): m is string => Boolean(m)).map(m => `${block}--${m}`);
  return [block, ...mods, ...extra].filter(Boolean).join(' ');
}

function ensurePortalRoot(): HTMLElement {
  let root = document.getElementById(DRAWER_ROOT_ID);
  if (!root) {
    root = document.createElement('div');
    root.setAttribute('id', DRAWER_ROOT_ID);
    document.body.appendChild(root);
  }
  return root;
}

function panelTransform(side: DrawerConfig['side'], visible: boolean, dragOffset: number): string {
  if (!visible) return side === 'right' ? 'translateX(100%)' : 'translateX(-100%)';
  return `translateX(${side === 'right' ? dragOffset : -dragOffset}px)`;
}

export const Drawer: React.FC<DrawerProps> = ({
  open,
  onClose,
  config = DEFAULT_DRAWER_CONFIG,
  trapFocus = true,
  initialFocusRef,
  className,
  backdropClassName,
  panelClassName,
  'aria-label': ariaLabel,
  'aria-labelledby': ariaLabelledby,
  'aria-describedby': ariaDescribedby,
  children,
}) => {
  const panelRef = useRef<HTMLDivElement>(null);
  const [portalRoot, setPortalRoot] = useState<HTMLElement | null>(null);
  const [shouldRender, setShouldRender] = useState(open);
  const [isAnimating, setIsAnimating] = useState(false);
  const viewport = useViewportSize();
  const { side, animationDuration } = config;

  useEffect(() => {
    setPortalRoot(ensurePortalRoot());
  }, []);

  // Keep the panel mounted until the exit transition finishes.
  useEffect(() => {
    if (open) {
      setShouldRender(true);
      const timer = setTimeout(() => setIsAnimating(true), ENTER_FRAME_DELAY);
      return () => clearTimeout(timer);
    }
    setIsAnimating(false);
    const timer = setTimeout(() => setShouldRender(false), animationDuration);
    return () => clearTimeout(timer);
  }, [open, animationDuration]);

  const mounted = portalRoot !== null && shouldRender;

  useDismissTriggers(config, mounted && open, onClose);
  useLockBodyScroll(mounted);
  useFocusTrap(panelRef, mounted && trapFocus, initialFocusRef);
  const dragState = useEdgeDrag(
    panelRef,
    side,
    config.maxDragExtent,
    mounted && open && config.dragEnabled,
    onClose
  );

  const handleBackdropClick = useCallback((e: React.MouseEvent) => {
    if (!config.closeOnClickOutside) return;
    if (e.target !== e.currentTarget) return;
    onClose();
  }, [config.closeOnClickOutside, onClose]);

  if (!portalRoot || !shouldRender) return null;

  const width = resolveDrawerWidth(config, viewport);
  const radius = `${config.borderRadius}px`;
  const transition = dragState.isDragging ? 'none' : `transform ${animationDuration}ms ease`;

  const panelStyle: React.CSSProperties = {
    position: 'fixed',
    top: 0,
    bottom: 0,
    left: side === 'left' ? 0 : undefined,
    right: side === 'right' ? 0 : undefined,
    width: `${width}px`,
    transform: panelTransform(side, isAnimating, dragState.offset),
    transition,
    touchAction: config.dragEnabled ? 'pan-y' : undefined,
    ...(side === 'right'
      ? { borderTopLeftRadius: radius, borderBottomLeftRadius: radius }
      : { borderTopRightRadius: radius, borderBottomRightRadius: radius }),
  };

  const backdropOpacity = isAnimating
    ? config.backdropOpacity * (1 - dragState.progress)
    : 0;

  const backdropStyle: React.CSSProperties = {
    position: 'fixed',
    inset: 0,
    backgroundColor: '#000',
    opacity: backdropOpacity,
    transition: dragState.isDragging ? 'none' : `opacity ${animationDuration}ms ease`,
  };

  const content = (
    <div
      className={drawerClassName(
        'drawer',
        [isAnimating && 'open', dragState.isDragging && 'dragging', `side-${side}`],
        className
      )}
      role="presentation"
      data-dragging={dragState.isDragging}
    >
      <div
        className={drawerClassName('drawer__backdrop', [], backdropClassName)}
        onClick={handleBackdropClick}
        style={backdropStyle}
      />
      <div
        ref={panelRef}
        className={drawerClassName('drawer__panel', [], panelClassName)}
        role="dialog"
        aria-modal="true"
        aria-label={ariaLabel}
        aria-labelledby={ariaLabel ? undefined : ariaLabelledby}
        aria-describedby={ariaDescribedby}
        tabIndex={-1}
        style={panelStyle}
        data-side={side}
        data-drag-progress={dragState.progress}
      >
        {children}
      </div>
    </div>
  );

  return ReactDOM.createPortal(content, portalRoot);
};

export default Drawer;
