/**
 * packages/node/src/input/keyDecoder.ts — Raw terminal bytes to key names.
 *
 * Key names follow the keybinding vocabulary of `@cellterm/core`: printable
 * characters stand for themselves, and named keys are `space`, `enter`,
 * `tab`, `backspace`, `escape`, `up`, `down`, `left`, `right`,
 * `ctrl+<letter>`. Modifiers on special keys prefix the name
 * (`ctrl+up`). Sequences the decoder does not understand become `unknown`.
 */

const ESC = "\u001b";

export const UNKNOWN_KEY = "unknown";

type Decoded = Readonly<{ consumed: number; key: string }>;
type DecodeStep = Decoded | Readonly<{ incomplete: true }>;

export type DecodeResult = Readonly<{
  keys: readonly string[];
  /** Unconsumed tail of an escape sequence split across chunks. */
  rest: string;
}>;

const ARROW_BY_SUFFIX: Readonly<Record<string, string>> = Object.freeze({
  A: "up",
  B: "down",
  C: "right",
  D: "left",
});

function arrowName(suffix: string | undefined): string | undefined {
  if (suffix === undefined || !Object.hasOwn(ARROW_BY_SUFFIX, suffix)) return undefined;
  return ARROW_BY_SUFFIX[suffix];
}

function withXtermModifiers(name: string, modifierParam: number | undefined): string {
  if (modifierParam === undefined) return name;
  const bits = Math.max(0, modifierParam - 1);
  const prefix: string[] = [];
  if ((bits & 4) !== 0) prefix.push("ctrl");
  if ((bits & 2) !== 0) prefix.push("alt");
  if ((bits & 1) !== 0) prefix.push("shift");
  return [...prefix, name].join("+");
}

function findCsiEnd(buffer: string): number {
  for (let index = 2; index < buffer.length; index += 1) {
    const code = buffer.charCodeAt(index);
    if (code >= 0x40 && code <= 0x7e) return index;
  }
  return -1;
}

function decodeCsi(buffer: string): DecodeStep {
  const endIndex = findCsiEnd(buffer);
  if (endIndex === -1) return { incomplete: true };

  const sequence = buffer.slice(0, endIndex + 1);
  const match = sequence.match(/^\u001b\[(?:(\d+)(?:;(\d+))?)?([A-Za-z~])$/);
  const arrow = arrowName(match?.[3]);
  if (!match || arrow === undefined) {
    return { consumed: sequence.length, key: UNKNOWN_KEY };
  }

  const modifier = match[2] === undefined ? undefined : Number.parseInt(match[2], 10);
  return { consumed: sequence.length, key: withXtermModifiers(arrow, modifier) };
}

function decodeSs3(buffer: string): DecodeStep {
  if (buffer.length < 3) return { incomplete: true };
  return { consumed: 3, key: arrowName(buffer[2]) ?? UNKNOWN_KEY };
}

function decodeControl(code: number): string {
  if (code === 13 || code === 10) return "enter";
  if (code === 9) return "tab";
  if (code === 8 || code === 0x7f) return "backspace";
  if (code >= 1 && code <= 26) return `ctrl+${String.fromCharCode(code + 96)}`;
  return UNKNOWN_KEY;
}

function decodeOne(buffer: string): DecodeStep {
  if (buffer.startsWith(`${ESC}[`)) return decodeCsi(buffer);
  if (buffer.startsWith(`${ESC}O`)) return decodeSs3(buffer);

  if (buffer.startsWith(ESC)) {
    // A lone ESC may be the first byte of a sequence still in flight.
    if (buffer.length === 1) return { incomplete: true };
    const next = buffer.codePointAt(1);
    const char = next === undefined ? "" : String.fromCodePoint(next);
    return { consumed: 1 + char.length, key: `alt+${char}` };
  }

  const first = buffer.codePointAt(0);
  if (first === undefined) return { consumed: 1, key: UNKNOWN_KEY };
  const char = String.fromCodePoint(first);

  if (first === 0x20) return { consumed: 1, key: "space" };
  if (first < 0x20 || first === 0x7f) return { consumed: 1, key: decodeControl(first) };
  return { consumed: char.length, key: char };
}

/**
 * Decodes as many keys as `buffer` holds. An escape sequence cut off at the
 * end is returned in `rest` so the caller can prepend it to the next chunk.
 */
export function decodeKeys(buffer: string): DecodeResult {
  const keys: string[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    const step = decodeOne(buffer.slice(offset));
    if ("incomplete" in step) {
      return { keys, rest: buffer.slice(offset) };
    }
    keys.push(step.key);
    offset += step.consumed;
  }

  return { keys, rest: "" };
}

/**
 * Decodes a carried tail that no further bytes completed: a lone ESC is the
 * escape key, anything else is an unknown sequence.
 */
export function flushStaleKeys(rest: string): readonly string[] {
  if (rest.length === 0) return [];
  if (rest === ESC) return ["escape"];
  return [UNKNOWN_KEY];
}
