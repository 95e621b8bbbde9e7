import type { CalculatorKey } from "@touchless-calc/calculator-core";
import type { DisplaySize, Point2D } from "@touchless-calc/gesture-core";
import type { Button, ButtonCategory, ButtonLayoutOptions, Rect } from "./types";

const DEFAULT_LAYOUT: Required<ButtonLayoutOptions> = {
  panelWidth: 400,
  paddingX: 20,
  top: 200,
  buttonWidth: 80,
  buttonHeight: 60,
  gutter: 8,
};

type Cell = { id: CalculatorKey; label: string; span?: number };

export const BUTTON_ROWS: readonly (readonly Cell[])[] = [
  [
    { id: "C", label: "C" },
    { id: "±", label: "±" },
    { id: "%", label: "%" },
    { id: "÷", label: "÷" },
  ],
  [
    { id: "7", label: "7" },
    { id: "8", label: "8" },
    { id: "9", label: "9" },
    { id: "×", label: "×" },
  ],
  [
    { id: "4", label: "4" },
    { id: "5", label: "5" },
    { id: "6", label: "6" },
    { id: "-", label: "−" },
  ],
  [
    { id: "1", label: "1" },
    { id: "2", label: "2" },
    { id: "3", label: "3" },
    { id: "+", label: "+" },
  ],
  [
    { id: "0", label: "0", span: 2 },
    { id: ".", label: "." },
    { id: "=", label: "=" },
  ],
];

export function categoryOf(id: CalculatorKey): ButtonCategory {
  switch (id) {
    case "+":
    case "-":
    case "×":
    case "÷":
      return "operator";
    case "C":
    case "del":
    case "±":
    case "%":
      return "command";
    case "=":
      return "equals";
    default:
      return "digit";
  }
}

export class ButtonLayout {
  readonly buttons: readonly Button[];
  readonly display: Readonly<DisplaySize>;
  private readonly byId: Map<CalculatorKey, Button>;

  constructor(display: DisplaySize, buttons: Button[]) {
    this.display = { ...display };
    this.byId = new Map();
    for (const button of buttons) {
      if (this.byId.has(button.id)) {
        throw new Error(`Duplicate button id: ${button.id}`);
      }
      this.byId.set(button.id, button);
    }
    this.buttons = buttons;
  }

  hitTest(point: Point2D): Button | undefined {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) return undefined;
    if (point.x < 0 || point.y < 0 || point.x > this.display.width || point.y > this.display.height) {
      return undefined;
    }
    return this.buttons.find((button) => containsPoint(button.rect, point));
  }

  getButton(id: CalculatorKey): Button | undefined {
    return this.byId.get(id);
  }
}

export function buildButtonLayout(display: DisplaySize, opts?: ButtonLayoutOptions): ButtonLayout {
  if (!(display.width > 0) || !(display.height > 0) || !Number.isFinite(display.width) || !Number.isFinite(display.height)) {
    throw new Error(`Display must have positive finite dimensions, got ${display.width}x${display.height}`);
  }
  const options = { ...DEFAULT_LAYOUT, ...(opts ?? {}) };
  const { buttonWidth, buttonHeight, gutter } = options;
  const originX = display.width - options.panelWidth + options.paddingX;

  const buttons: Button[] = [];
  BUTTON_ROWS.forEach((row, rowIdx) => {
    let column = 0;
    for (const cell of row) {
      const span = cell.span ?? 1;
      const left = originX + column * (buttonWidth + gutter);
      const top = options.top + rowIdx * (buttonHeight + gutter);
      const width = span * buttonWidth + (span - 1) * gutter;
      const rect: Rect = { left, top, right: left + width, bottom: top + buttonHeight };
      buttons.push({
        id: cell.id,
        label: cell.label,
        category: categoryOf(cell.id),
        rect,
        center: { x: left + width / 2, y: top + buttonHeight / 2 },
      });
      column += span;
    }
  });

  return new ButtonLayout(display, buttons);
}

export function containsPoint(rect: Rect, point: Point2D): boolean {
  return point.x >= rect.left && point.x <= rect.right && point.y >= rect.top && point.y <= rect.bottom;
}

export { DEFAULT_LAYOUT as defaultButtonLayoutOptions };
