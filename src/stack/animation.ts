/**
 * rowstack/stack - Row Animations
 * Fixed-duration opacity transitions with a completion callback.
 *
 * Model state (hidden flag, membership) changes when the call is made;
 * only the visual fade and anything passed as `completion` are deferred.
 */

import type { RowCell } from "../types";

// =============================================================================
// Types
// =============================================================================

export interface Animator {
  readonly duration: number;

  /** Fade a freshly inserted cell from transparent to opaque */
  fadeIn: (cell: RowCell) => void;

  /** Mark the cell hidden now; it collapses once faded out */
  hide: (cell: RowCell, completion?: () => void) => void;

  /** Mark the cell visible now and fade it in */
  show: (cell: RowCell) => void;

  /** Drop every pending completion */
  cancelAll: () => void;
}

// =============================================================================
// Factory
// =============================================================================

export const createAnimator = (duration: number): Animator => {
  const timers = new Set<ReturnType<typeof setTimeout>>();

  const run = (
    cell: RowCell,
    animations: () => void,
    completion: () => void,
  ): void => {
    const { element } = cell;
    element.style.transition = `opacity ${duration}ms ease-in-out`;

    // Commit the starting opacity so the change below transitions
    void element.offsetWidth;
    animations();

    const timer = setTimeout(() => {
      timers.delete(timer);
      element.style.transition = "";
      completion();
    }, duration);
    timers.add(timer);
  };

  const fadeIn = (cell: RowCell): void => {
    cell.opacity = 0;
    run(
      cell,
      () => {
        cell.opacity = 1;
      },
      () => {},
    );
  };

  const hide = (cell: RowCell, completion?: () => void): void => {
    cell.isHidden = true;
    // Keep painting while the fade runs
    cell.element.style.display = "flex";
    run(
      cell,
      () => {
        cell.opacity = 0;
      },
      () => {
        if (cell.isHidden) cell.element.style.display = "none";
        cell.opacity = 1;
        completion?.();
      },
    );
  };

  const show = (cell: RowCell): void => {
    cell.isHidden = false;
    fadeIn(cell);
  };

  return {
    duration,
    fadeIn,
    hide,
    show,
    cancelAll() {
      timers.forEach((timer) => clearTimeout(timer));
      timers.clear();
    },
  };
};
