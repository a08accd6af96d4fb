/**
 * rowstack/cell - Highlight Forwarding
 * Tracks a press on the cell and tells highlightable content whether the
 * pointer is still over it.
 */

import { isHighlightable, isInteractionEnabled } from "./capabilities";
import { shouldReceiveTap } from "./gesture";

export interface HighlightTracker {
  /** Stop tracking; a press in progress ends unhighlighted */
  destroy: () => void;
}

/** Whether a viewport point lies inside the element's box */
export const isPointInside = (
  element: Element,
  clientX: number,
  clientY: number,
): boolean => {
  const rect = element.getBoundingClientRect();
  return (
    clientX >= rect.left &&
    clientX < rect.right &&
    clientY >= rect.top &&
    clientY < rect.bottom
  );
};

/**
 * Forward press state from `owner` to `content`.
 *
 * Move and up listeners live on the document for the duration of a press,
 * so a pointer dragged off the cell still reports. Presses that land on a
 * nested control belong to that control and are not tracked.
 *
 * @param onChange - runs after every highlight update
 */
export const createHighlightTracker = (
  owner: HTMLElement,
  content: HTMLElement,
  onChange: (highlighted: boolean) => void,
): HighlightTracker => {
  const doc = owner.ownerDocument;
  let pressed = false;

  const setHighlighted = (highlighted: boolean): void => {
    if (!isInteractionEnabled(content)) return;
    if (!isHighlightable(content) || !content.isHighlightable) return;
    content.setIsHighlighted(highlighted);
    onChange(highlighted);
  };

  const handlePointerMove = (e: MouseEvent): void => {
    if (!pressed) return;
    setHighlighted(isPointInside(owner, e.clientX, e.clientY));
  };

  const endPress = (): void => {
    if (!pressed) return;
    pressed = false;
    doc.removeEventListener("pointermove", handlePointerMove);
    doc.removeEventListener("pointerup", endPress);
    doc.removeEventListener("pointercancel", endPress);
    setHighlighted(false);
  };

  const handlePointerDown = (e: MouseEvent): void => {
    if (!shouldReceiveTap(owner, e.target)) return;
    pressed = true;
    doc.addEventListener("pointermove", handlePointerMove);
    doc.addEventListener("pointerup", endPress);
    doc.addEventListener("pointercancel", endPress);
    setHighlighted(true);
  };

  owner.addEventListener("pointerdown", handlePointerDown);

  return {
    destroy() {
      owner.removeEventListener("pointerdown", handlePointerDown);
      endPress();
    },
  };
};
