/**
 * rowstack - Row Cell Tests
 * Edge pins, accessory placement, styling, taps and highlight forwarding
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createRowCell, cellOfRow } from "../../src/cell/cell";
import { resolveContentEdges } from "../../src/cell/layout";
import {
  createHighlightableRow,
  createRow,
  createTappableRow,
  pointer,
  rect,
} from "../helpers";

afterEach(() => {
  document.body.innerHTML = "";
});

// =============================================================================
// Edge Pins
// =============================================================================

describe("resolveContentEdges", () => {
  const insets = { top: 12, left: 16, bottom: 10, right: 20 };

  it("should pin every edge to the margins", () => {
    const edges = resolveContentEdges("layoutMargins", insets, false);

    expect(edges.top).toEqual({ target: "margins", constant: 12, required: true });
    expect(edges.left).toEqual({ target: "margins", constant: 16, required: true });
    expect(edges.right).toEqual({ target: "margins", constant: 20, required: true });
  });

  it("should pin every edge to the bounds", () => {
    const edges = resolveContentEdges("none", insets, false);

    expect(edges.top).toEqual({ target: "bounds", constant: 0, required: true });
    expect(edges.right).toEqual({ target: "bounds", constant: 0, required: true });
  });

  it("should keep the bottom pin soft", () => {
    expect(resolveContentEdges("layoutMargins", insets, false).bottom).toEqual({
      target: "margins",
      constant: 10,
      required: false,
    });
    expect(resolveContentEdges("none", insets, false).bottom.required).toBe(false);
  });

  it("should pin the right edge to the accessory", () => {
    const edges = resolveContentEdges("layoutMargins", insets, true);
    expect(edges.right).toEqual({ target: "accessory", constant: 8, required: true });
  });
});

// =============================================================================
// Structure & Styling
// =============================================================================

describe("createRowCell", () => {
  it("should wrap the content", () => {
    const row = createRow("a");
    const cell = createRowCell(row);

    expect(cell.content).toBe(row);
    expect(row.parentElement).toBe(cell.element);
    expect(cell.element.getAttribute("role")).toBe("listitem");
    expect(cellOfRow(row)).toBe(cell);
  });

  it("should move content out of a previous cell", () => {
    const row = createRow("a");
    const first = createRowCell(row);
    const second = createRowCell(row);

    expect(first.element.children.length).toBe(0);
    expect(cellOfRow(row)).toBe(second);
  });

  it("should not resolve a cell for a detached row", () => {
    expect(cellOfRow(createRow("a"))).toBeNull();
  });

  it("should default to layout margins, zero insets and no override height", () => {
    const cell = createRowCell(createRow("a"));

    expect(cell.insetsReference).toBe("layoutMargins");
    expect(cell.insets).toEqual({ top: 0, left: 0, bottom: 0, right: 0 });
    expect(cell.overrideHeight).toBeNull();
    expect(cell.element.style.height).toBe("");
  });

  it("should apply insets as padding", () => {
    const cell = createRowCell(createRow("a"));
    cell.insets = { top: 4, left: 16, bottom: 6, right: 20 };

    expect(cell.element.style.paddingTop).toBe("4px");
    expect(cell.element.style.paddingLeft).toBe("16px");
    expect(cell.element.style.paddingBottom).toBe("6px");
    expect(cell.element.style.paddingRight).toBe("20px");
    expect(cell.edges.left.constant).toBe(16);
  });

  it("should ignore insets when pinned to the bounds", () => {
    const cell = createRowCell(createRow("a"), { insetsReference: "none" });
    cell.insets = { top: 4, left: 16, bottom: 6, right: 20 };

    expect(cell.element.style.paddingTop).toBe("0px");
    expect(cell.element.style.paddingLeft).toBe("0px");
    expect(cell.element.style.paddingRight).toBe("0px");
    expect(cell.insets).toEqual({ top: 4, left: 16, bottom: 6, right: 20 });
  });

  it("should fix the height and clip with an override height", () => {
    const cell = createRowCell(createRow("a"), { overrideHeight: 44 });

    expect(cell.overrideHeight).toBe(44);
    expect(cell.element.style.height).toBe("44px");
    expect(cell.element.style.overflow).toBe("hidden");
  });

  it("should copy insets on read and write", () => {
    const cell = createRowCell(createRow("a"));
    const insets = { top: 1, left: 2, bottom: 3, right: 4 };

    cell.insets = insets;
    insets.top = 99;
    cell.insets.left = 99;

    expect(cell.insets).toEqual({ top: 1, left: 2, bottom: 3, right: 4 });
  });

  it("should paint the background color", () => {
    const cell = createRowCell(createRow("a"));
    expect(cell.backgroundColor).toBe("transparent");

    cell.backgroundColor = "rgb(10, 20, 30)";
    expect(cell.element.style.backgroundColor).toBe("rgb(10, 20, 30)");
  });

  it("should toggle display and aria-hidden with isHidden", () => {
    const cell = createRowCell(createRow("a"));

    cell.isHidden = true;
    expect(cell.element.style.display).toBe("none");
    expect(cell.element.getAttribute("aria-hidden")).toBe("true");

    cell.isHidden = false;
    expect(cell.element.style.display).toBe("flex");
    expect(cell.element.getAttribute("aria-hidden")).toBe("false");
  });
});

// =============================================================================
// Accessory
// =============================================================================

describe("accessory", () => {
  it("should place the accessory after the content", () => {
    const row = createRow("a");
    const cell = createRowCell(row);
    const chevron = document.createElement("span");

    cell.insets = { top: 0, left: 0, bottom: 0, right: 15 };
    cell.accessory = chevron;

    expect(Array.from(cell.element.children)).toEqual([row, chevron]);
    expect(chevron.style.marginLeft).toBe("8px");
    expect(cell.edges.right.target).toBe("accessory");
    expect(cell.element.style.paddingRight).toBe("15px");
  });

  it("should align the accessory to the margin even when pinned to bounds", () => {
    const cell = createRowCell(createRow("a"), { insetsReference: "none" });
    cell.insets = { top: 0, left: 0, bottom: 0, right: 15 };

    expect(cell.element.style.paddingRight).toBe("0px");

    cell.accessory = document.createElement("span");
    expect(cell.element.style.paddingRight).toBe("15px");
  });

  it("should replace a previous accessory", () => {
    const cell = createRowCell(createRow("a"));
    const first = document.createElement("span");
    const second = document.createElement("span");

    cell.accessory = first;
    cell.accessory = second;

    expect(first.parentElement).toBeNull();
    expect(first.style.marginLeft).toBe("");
    expect(second.parentElement).toBe(cell.element);
  });

  it("should restore the content's right pin when cleared", () => {
    const cell = createRowCell(createRow("a"));
    cell.insets = { top: 0, left: 0, bottom: 0, right: 15 };
    const chevron = document.createElement("span");

    cell.accessory = chevron;
    cell.accessory = null;

    expect(chevron.parentElement).toBeNull();
    expect(cell.edges.right).toEqual({
      target: "margins",
      constant: 15,
      required: true,
    });
  });
});

// =============================================================================
// Taps
// =============================================================================

describe("taps", () => {
  it("should install a recognizer for tappable content", () => {
    expect(createRowCell(createTappableRow("a")).isTapEnabled).toBe(true);
    expect(createRowCell(createRow("b")).isTapEnabled).toBe(false);
  });

  it("should call didTapView before the tap handler", () => {
    const row = createTappableRow("a");
    const cell = createRowCell(row);
    const order: string[] = [];

    row.didTapView.mockImplementation(() => order.push("content"));
    cell.tapHandler = (content) => order.push(`handler:${content.id}`);

    row.click();

    expect(order).toEqual(["content", "handler:a"]);
  });

  it("should let a nested control keep its tap", () => {
    const row = createTappableRow("a");
    const toggle = document.createElement("input");
    toggle.type = "checkbox";
    row.appendChild(toggle);

    const cell = createRowCell(row);
    const handler = vi.fn();
    cell.tapHandler = handler;

    toggle.click();

    expect(row.didTapView).not.toHaveBeenCalled();
    expect(handler).not.toHaveBeenCalled();
  });

  it("should install a recognizer when a handler is set on plain content", () => {
    const row = createRow("a");
    const cell = createRowCell(row);
    const handler = vi.fn();

    cell.tapHandler = handler;
    row.click();

    expect(cell.isTapEnabled).toBe(true);
    expect(handler).toHaveBeenCalledWith(row);
  });

  it("should disable the recognizer when the handler is cleared", () => {
    const row = createTappableRow("a");
    const cell = createRowCell(row);

    cell.tapHandler = vi.fn();
    cell.tapHandler = null;
    row.click();

    expect(cell.isTapEnabled).toBe(false);
    expect(row.didTapView).not.toHaveBeenCalled();
  });

  it("should ignore taps on inert content", () => {
    const row = createTappableRow("a");
    row.setAttribute("inert", "");
    createRowCell(row);

    row.click();

    expect(row.didTapView).not.toHaveBeenCalled();
  });

  it("should stop recognizing after destroy", () => {
    const row = createTappableRow("a");
    const cell = createRowCell(row);

    cell.destroy();
    row.click();

    expect(row.didTapView).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Highlight
// =============================================================================

describe("highlight", () => {
  const mount = (isHighlightable = true) => {
    const row = createHighlightableRow("a", isHighlightable);
    const cell = createRowCell(row);
    document.body.appendChild(cell.element);
    vi.spyOn(cell.element, "getBoundingClientRect").mockReturnValue(
      rect(0, 0, 100, 50),
    );
    return { row, cell };
  };

  it("should follow a press in and out of the cell", () => {
    const { row, cell } = mount();

    pointer(row, "pointerdown", 10, 10);
    pointer(document, "pointermove", 150, 10);
    pointer(document, "pointermove", 50, 49);
    pointer(document, "pointerup", 50, 49);

    expect(row.setIsHighlighted.mock.calls).toEqual([
      [true],
      [false],
      [true],
      [false],
    ]);
    expect(cell.element.style.backgroundColor).toBe("transparent");
  });

  it("should treat the right and bottom edges as outside", () => {
    const { row } = mount();

    pointer(row, "pointerdown", 10, 10);
    pointer(document, "pointermove", 100, 10);
    pointer(document, "pointermove", 10, 50);

    expect(row.setIsHighlighted.mock.calls).toEqual([[true], [false], [false]]);
  });

  it("should paint the highlight color while pressed", () => {
    const { row, cell } = mount();
    cell.highlightColor = "rgb(1, 2, 3)";

    pointer(row, "pointerdown", 10, 10);
    expect(cell.element.style.backgroundColor).toBe("rgb(1, 2, 3)");

    pointer(document, "pointercancel");
    expect(cell.element.style.backgroundColor).toBe("transparent");
  });

  it("should ignore moves without a press", () => {
    const { row } = mount();

    pointer(document, "pointermove", 10, 10);

    expect(row.setIsHighlighted).not.toHaveBeenCalled();
  });

  it("should skip content that opts out", () => {
    const { row } = mount(false);

    pointer(row, "pointerdown", 10, 10);
    pointer(document, "pointerup", 10, 10);

    expect(row.setIsHighlighted).not.toHaveBeenCalled();
  });

  it("should leave presses on a nested control to the control", () => {
    const { row } = mount();
    const button = document.createElement("button");
    row.appendChild(button);

    pointer(button, "pointerdown", 10, 10);
    pointer(document, "pointermove", 20, 20);
    pointer(document, "pointerup", 20, 20);

    expect(row.setIsHighlighted).not.toHaveBeenCalled();
  });

  it("should end the highlight when destroyed during a press", () => {
    const { row, cell } = mount();
    cell.highlightColor = "rgb(1, 2, 3)";

    pointer(row, "pointerdown", 10, 10);
    cell.destroy();
    pointer(document, "pointerup", 10, 10);

    expect(row.setIsHighlighted.mock.calls).toEqual([[true], [false]]);
    expect(cell.element.style.backgroundColor).toBe("transparent");
  });

  it("should not touch the highlight when destroyed without a press", () => {
    const { row, cell } = mount();

    cell.destroy();

    expect(row.setIsHighlighted).not.toHaveBeenCalled();
  });

  it("should skip content with interaction disabled", () => {
    const { row } = mount();
    row.setAttribute("aria-disabled", "true");

    pointer(row, "pointerdown", 10, 10);

    expect(row.setIsHighlighted).not.toHaveBeenCalled();
  });
});
