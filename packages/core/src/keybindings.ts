import type { InputSymbol } from "./ports.js";

const SYMBOL_BY_KEY: Readonly<Record<string, InputSymbol>> = Object.freeze({
  q: "quit",
  "ctrl+c": "quit",
  escape: "quit",
  space: "toggle-pause",
  p: "toggle-pause",
  r: "randomize",
  c: "clear",
  f: "step-once",
  n: "step-once",
  up: "move-up",
  k: "move-up",
  down: "move-down",
  j: "move-down",
  left: "move-left",
  h: "move-left",
  right: "move-right",
  l: "move-right",
  enter: "toggle-cell",
  x: "toggle-cell",
  v: "toggle-cursor-visibility",
  g: "toggle-glyph",
  "+": "increase-delay",
  "=": "increase-delay",
  "-": "decrease-delay",
  _: "decrease-delay",
});

/** Maps a normalized key name (see the node key decoder) to an input symbol. */
export function resolveInputSymbol(key: string): InputSymbol {
  const normalized = key.toLowerCase();
  if (!Object.hasOwn(SYMBOL_BY_KEY, normalized)) return "unrecognized";
  return SYMBOL_BY_KEY[normalized] ?? "unrecognized";
}
