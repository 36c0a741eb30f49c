export class GoplayError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GoplayError";
    this.code = code;
  }
}

// ── Startup ──

export class ConfigError extends GoplayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Playground ──

export class PlaygroundHttpError extends GoplayError {
  readonly status: number;

  constructor(endpoint: string, status: number, body: string) {
    super(`Playground ${endpoint} returned HTTP ${status}${body ? `: ${body}` : ""}`, "PLAYGROUND_HTTP");
    this.name = "PlaygroundHttpError";
    this.status = status;
  }
}

/** Syntax error or unresolvable import reported while formatting a snippet. */
export class FormatError extends GoplayError {
  readonly diagnostic: string;

  constructor(diagnostic: string, options?: ErrorOptions) {
    super(`could not format / imports source: ${diagnostic}`, "FORMAT", options);
    this.name = "FormatError";
    this.diagnostic = diagnostic;
  }
}

export class ExecutionServiceError extends GoplayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "EXECUTION_SERVICE", options);
    this.name = "ExecutionServiceError";
  }
}

// ── Snippet lookup ──

export class UnresolvableReference extends GoplayError {
  readonly reference: string;

  constructor(reference: string) {
    super("invalid snippet reference", "UNRESOLVABLE_REFERENCE");
    this.name = "UnresolvableReference";
    this.reference = reference;
  }
}

export class SnippetNotFound extends GoplayError {
  readonly snippetId: string;

  constructor(snippetId: string) {
    super("snippet does not exist", "SNIPPET_NOT_FOUND");
    this.name = "SnippetNotFound";
    this.snippetId = snippetId;
  }
}

export class SnippetFetchError extends GoplayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SNIPPET_FETCH", options);
    this.name = "SnippetFetchError";
  }
}

// ── Utilities ──

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
