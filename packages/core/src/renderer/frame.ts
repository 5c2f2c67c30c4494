/**
 * packages/core/src/renderer/frame.ts — Static decoration drawn once per session.
 */

import {
  type FrameLayout,
  INSTRUCTIONS,
  PANEL_ACTION_WIDTH,
  PANEL_KEY_WIDTH,
  PANEL_WIDTH,
  type ScreenPoint,
} from "../layout.js";

export type PositionedText = ScreenPoint &
  Readonly<{
    text: string;
  }>;

function horizontal(length: number): string {
  return "═".repeat(Math.max(0, length));
}

function panelRow(content: string): string {
  return `║ ${content} ║`;
}

function instructionText(keys: string, action: string): string {
  return `${`${keys}:`.padEnd(PANEL_KEY_WIDTH)}${action.padEnd(PANEL_ACTION_WIDTH)}`;
}

/** Fixed width so a shorter value fully overwrites a longer one. */
export function renderDelayReadout(delayMs: number): string {
  return instructionText("delay", `${String(delayMs)} ms`);
}

function bottomBorder(boardWidth: number): string {
  const chars = [..."╠", ...horizontal(boardWidth), "╝"];
  const junction = PANEL_WIDTH - 1;
  if (junction > 0 && junction < chars.length - 1) {
    chars[junction] = "╦";
  }
  return chars.join("");
}

export function renderFrame(layout: FrameLayout): readonly PositionedText[] {
  const out: PositionedText[] = [
    { col: 0, row: 0, text: `╔${horizontal(layout.boardWidth)}╗` },
    { col: 0, row: layout.bottomBorderRow, text: bottomBorder(layout.boardWidth) },
  ];

  INSTRUCTIONS.forEach((entry, index) => {
    out.push({
      col: 0,
      row: layout.panelTopRow + index,
      text: panelRow(instructionText(entry.keys, entry.action)),
    });
  });

  out.push({
    col: 0,
    row: layout.delayReadout.row,
    text: panelRow(" ".repeat(PANEL_KEY_WIDTH + PANEL_ACTION_WIDTH)),
  });
  out.push({
    col: 0,
    row: layout.panelBottomRow,
    text: `╚${horizontal(PANEL_WIDTH - 2)}╝`,
  });

  return Object.freeze(out);
}
