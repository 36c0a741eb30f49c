import { CONSOLE_LOGGER, type Logger } from "../app/logging.js";
import { ExecutionServiceError, errorMessage } from "../errors.js";
import type { CompileResponse, PlaygroundApi } from "./api.js";

export interface OutputEvent {
  message: string;
  /** "stdout" or "stderr" as reported by the Playground. */
  kind: string;
  delayMs: number;
}

/**
 * Outcome of one `/compile` call. A non-empty `compileErrors` means the
 * program never ran, and `events` is then always empty.
 */
export interface ExecutionResult {
  readonly compileErrors: string;
  readonly events: readonly OutputEvent[];
  readonly vetErrors: string;
}

export interface ExecutionOutcome {
  result: ExecutionResult;
  /** Share URL, or null when the sharing service could not provide one. */
  shareLink: string | null;
}

export interface RunOptions {
  requestShareLink?: boolean;
}

export class ExecutionClient {
  constructor(
    private readonly api: Pick<PlaygroundApi, "compile" | "share">,
    private readonly logger: Logger = CONSOLE_LOGGER,
  ) {}

  async run(source: string, options: RunOptions = {}): Promise<ExecutionOutcome> {
    // Started first so both requests are in flight together; never rejects.
    const shareLink = options.requestShareLink ? this.createShareLink(source) : Promise.resolve(null);

    let response: CompileResponse;
    try {
      response = await this.api.compile(source);
    } catch (error) {
      throw new ExecutionServiceError(`error from goplay: ${errorMessage(error)}`, { cause: error });
    }

    return {
      result: toExecutionResult(response),
      shareLink: await shareLink,
    };
  }

  private async createShareLink(source: string): Promise<string | null> {
    try {
      return await this.api.share(source);
    } catch (error) {
      this.logger.warn("Unable to create share link", error);
      return null;
    }
  }
}

export function toExecutionResult(response: CompileResponse): ExecutionResult {
  const compileErrors = response.Errors ?? "";
  const vetErrors = response.VetErrors ?? "";
  if (compileErrors.length > 0) {
    return { compileErrors, events: [], vetErrors };
  }

  const events = (response.Events ?? []).map((event) => ({
    message: event.Message,
    kind: event.Kind ?? "stdout",
    delayMs: Math.round((event.Delay ?? 0) / 1_000_000),
  }));

  return { compileErrors: "", events, vetErrors };
}
