/**
 * Single-keystroke decision source for interactive renames.
 */

import { emitKeypressEvents } from "node:readline";
import type { Key } from "node:readline";
import type { Decision, DecisionSource } from "../types.js";
import type { Colors } from "./common.js";

export const PROMPT = "Replace filename/dirname? [Y]es/[n]o/[a]ll/[q]uit:";

/** Map one keypress to a decision; other keys are ignored. */
export function decisionForKey(key: Key): Decision | undefined {
  if (key.ctrl && key.name === "c") return "quit";
  if (key.ctrl || key.meta) return undefined;
  switch (key.name) {
    case "y":
    case "return":
    case "enter":
      return "yes";
    case "n":
      return "no";
    case "a":
      return "all";
    case "q":
    case "escape":
      return "quit";
    default:
      return undefined;
  }
}

const ECHO: Record<Decision, string> = { yes: "y", no: "n", all: "a", quit: "q" };

/** process.stdin, or any readable stream when there is no terminal. */
export interface KeystrokeInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface KeystrokeStreams {
  input: KeystrokeInput;
  output: { write(text: string): unknown };
}

function readDecision({ input, output }: KeystrokeStreams): Promise<Decision> {
  emitKeypressEvents(input);
  const wasRaw = input.isRaw ?? false;
  if (input.isTTY) input.setRawMode?.(true);
  input.resume();

  return new Promise((resolve) => {
    const finish = (decision: Decision, echo: string) => {
      input.off("keypress", onKeypress);
      input.off("end", onEnd);
      if (input.isTTY) input.setRawMode?.(wasRaw);
      input.pause();
      output.write(`\r${echo}\n`);
      resolve(decision);
    };
    const onKeypress = (_str: string | undefined, key: Key | undefined) => {
      if (key === undefined) return;
      const decision = decisionForKey(key);
      if (decision === undefined) return;
      finish(decision, key.ctrl && key.name === "c" ? "^C" : ECHO[decision]);
    };
    const onEnd = () => finish("quit", ECHO.quit);

    input.on("keypress", onKeypress);
    input.once("end", onEnd);
  });
}

export function createKeystrokeDecisionSource(
  c: Colors,
  streams: KeystrokeStreams = { input: process.stdin, output: process.stdout },
): DecisionSource {
  return {
    decide() {
      streams.output.write(`${c.cyan(PROMPT)} `);
      return readDecision(streams);
    },
  };
}
