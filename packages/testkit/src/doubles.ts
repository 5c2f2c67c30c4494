/**
 * In-process stand-ins for the session ports. Nothing here touches a TTY.
 */

import type { DisplaySink, InputSource, InputSymbol, SessionLogger, Sleep } from "@cellterm/core";

export type ScriptedInput = InputSource &
  Readonly<{
    /** Number of poll() calls made so far. */
    polls: () => number;
    remaining: () => number;
  }>;

/**
 * Plays back one entry per poll. `undefined` entries model ticks with no key
 * pressed. Once the script runs out every poll returns `quit`, so a loop under
 * test always terminates.
 */
export function createScriptedInput(
  script: readonly (InputSymbol | undefined)[],
  whenExhausted: InputSymbol | undefined = "quit",
): ScriptedInput {
  const queue = [...script];
  let pollCount = 0;

  return {
    poll: () => {
      pollCount++;
      if (queue.length === 0) return whenExhausted;
      return queue.shift();
    },
    polls: () => pollCount,
    remaining: () => queue.length,
  };
}

export type DisplayCall =
  | Readonly<{ op: "writeAt"; col: number; row: number; text: string }>
  | Readonly<{ op: "clear" }>
  | Readonly<{ op: "setCursorVisible"; visible: boolean }>
  | Readonly<{ op: "moveCursor"; col: number; row: number }>
  | Readonly<{ op: "flush" }>;

export type RecordingDisplay = DisplaySink &
  Readonly<{
    calls: () => readonly DisplayCall[];
    /** Calls grouped per flush; the trailing unflushed group is omitted. */
    batches: () => readonly (readonly DisplayCall[])[];
    /** Make every subsequent call of `op` throw until cleared with `undefined`. */
    failOn: (op: DisplayCall["op"] | undefined) => void;
    /** Screen text as rows, with later writes overwriting earlier ones. */
    screen: () => readonly string[];
  }>;

export function createRecordingDisplay(): RecordingDisplay {
  const log: DisplayCall[] = [];
  let failing: DisplayCall["op"] | undefined;

  const record = (call: DisplayCall): void => {
    if (failing === call.op) {
      throw new Error(`simulated ${call.op} failure`);
    }
    log.push(call);
  };

  const screen = (): readonly string[] => {
    const rows: string[][] = [];
    for (const call of log) {
      if (call.op === "clear") {
        rows.length = 0;
        continue;
      }
      if (call.op !== "writeAt") continue;
      while (rows.length <= call.row) rows.push([]);
      const row = rows[call.row] ?? [];
      const chars = [...call.text];
      chars.forEach((ch, offset) => {
        const col = call.col + offset;
        while (row.length < col) row.push(" ");
        row[col] = ch;
      });
    }
    return rows.map((row) => row.join(""));
  };

  return {
    writeAt: (col, row, text) => record({ op: "writeAt", col, row, text }),
    clear: () => record({ op: "clear" }),
    setCursorVisible: (visible) => record({ op: "setCursorVisible", visible }),
    moveCursor: (col, row) => record({ op: "moveCursor", col, row }),
    flush: () => record({ op: "flush" }),
    calls: () => [...log],
    batches: () => {
      const out: DisplayCall[][] = [];
      let current: DisplayCall[] = [];
      for (const call of log) {
        current.push(call);
        if (call.op === "flush") {
          out.push(current);
          current = [];
        }
      }
      return out;
    },
    failOn: (op) => {
      failing = op;
    },
    screen,
  };
}

export type InstantSleep = Sleep &
  Readonly<{
    requested: () => readonly number[];
  }>;

/** Resolves immediately and records each requested delay. */
export function createInstantSleep(): InstantSleep {
  const requested: number[] = [];
  const sleep = (ms: number): Promise<void> => {
    requested.push(ms);
    return Promise.resolve();
  };
  return Object.assign(sleep, { requested: () => [...requested] });
}

export type RecordingLogger = SessionLogger &
  Readonly<{
    lines: () => readonly string[];
  }>;

export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    debug: (message) => {
      lines.push(`debug: ${message}`);
    },
    warn: (message) => {
      lines.push(`warn: ${message}`);
    },
    lines: () => [...lines],
  };
}
