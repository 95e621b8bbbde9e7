import type { RenderSnapshot } from "@touchless-calc/calculator-session";
import type { Button } from "@touchless-calc/touch-core";

const HISTORY_LINES = 4;

const INSTRUCTIONS = [
  "point with your index finger, keep the other fingers closed",
  "keys: q quit  t theme  i instructions  r reset history  c clear  backspace delete",
];

function groupRows(buttons: readonly Button[]): Button[][] {
  const rows = new Map<number, Button[]>();
  for (const button of buttons) {
    rows.set(button.rect.top, [...(rows.get(button.rect.top) ?? []), button]);
  }
  return [...rows.entries()].sort(([a], [b]) => a - b).map(([, row]) => row);
}

function renderCell(button: Button, snapshot: RenderSnapshot): string {
  if (button.id === snapshot.pressedId) return `<${button.label}>`;
  if (button.id === snapshot.hoveredId) return `[${button.label}]`;
  return ` ${button.label} `;
}

/** Plain-text panel: `<x>` marks a press this frame, `[x]` a hover. */
export function renderText(snapshot: RenderSnapshot): string {
  const lines = [`display: ${snapshot.display}${snapshot.error ? " (!)" : ""}`];
  if (snapshot.pendingOperator) lines.push(`operation: ${snapshot.pendingOperator}`);
  for (const row of groupRows(snapshot.buttons)) {
    lines.push(row.map((button) => renderCell(button, snapshot)).join(" ").trimEnd());
  }

  const target = snapshot.pressedId ?? snapshot.hoveredId;
  lines.push(`touch: ${snapshot.phase}${target ? ` ${target}` : ""} | theme: ${snapshot.theme}`);

  const recent = snapshot.history.slice(-HISTORY_LINES);
  if (recent.length === 0) {
    lines.push("history: (none)");
  } else {
    lines.push("history:");
    for (const entry of recent) lines.push(`  ${entry.expression} = ${entry.result}`);
  }

  if (snapshot.showInstructions) lines.push(...INSTRUCTIONS);
  return lines.join("\n");
}
