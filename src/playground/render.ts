import type { ExecutionResult } from "./execution.js";

export const NO_OUTPUT_MESSAGE = "Complete, but no prints";
export const OUTPUT_SUPPRESSED_MESSAGE = "Output suppressed, non-printable characters detected.";
export const SHARE_LINK_UNAVAILABLE = "Unable to create share link";

// Letters, marks, numbers, punctuation, symbols and the ASCII space.
const NON_PRINTABLE = /[^\p{L}\p{M}\p{N}\p{P}\p{S} ]/u;

export interface RenderOptions {
  /** Prefix for compile failures, e.g. "Compile failed! ". */
  compileErrorLabel?: string;
  /** Prefix for program output, e.g. "Complete: ". */
  outputLabel?: string;
}

/** First line of program output, made safe to relay to a channel. */
export function firstLineOf(message: string): string {
  const newline = message.indexOf("\n");
  const firstLine = (newline >= 0 ? message.slice(0, newline) : message).trim().replaceAll("\x07", "");

  if (NON_PRINTABLE.test(firstLine)) {
    return OUTPUT_SUPPRESSED_MESSAGE;
  }

  return firstLine;
}

export function renderCompileErrors(compileErrors: string, label = ""): string {
  return `${label}${compileErrors.trim()}`;
}

export function renderRun(result: ExecutionResult, options: RenderOptions = {}): string {
  if (result.compileErrors.length > 0) {
    return renderCompileErrors(result.compileErrors, options.compileErrorLabel);
  }

  if (result.events.length === 0) {
    return NO_OUTPUT_MESSAGE;
  }

  const line = `${options.outputLabel ?? ""}${firstLineOf(result.events[0].message)}`;
  if (result.events.length > 1) {
    return `${line} (First line only. ${result.events.length} events returned)`;
  }
  return line;
}

export function withShareLink(line: string, shareLink: string | null): string {
  return `${shareLink ?? SHARE_LINK_UNAVAILABLE} : ${line}`;
}
