export type GlyphName = "unicode" | "ascii";

export const GLYPHS: Readonly<Record<GlyphName, string>> = Object.freeze({
  unicode: "■",
  ascii: "#",
});

export const DEAD_CELL = " ";

export function glyphChar(name: GlyphName): string {
  return GLYPHS[name];
}

export function nextGlyph(name: GlyphName): GlyphName {
  return name === "unicode" ? "ascii" : "unicode";
}
