import { FormatError, errorMessage } from "../errors.js";
import type { FormatResponse, PlaygroundApi } from "./api.js";

/** Produces canonical (gofmt + goimports) source or throws FormatError. */
export interface SourceFormatter {
  format(source: string): Promise<string>;
}

export interface TransformOptions {
  /** Treat the input as a function body and wrap it in `package main` / `func main()`. */
  wrapBody?: boolean;
}

export function wrapFunctionBody(body: string): string {
  return `package main\n\nfunc main() {\n${body}\n}\n`;
}

/**
 * Formats through the Playground's `/fmt` endpoint with import resolution
 * enabled. Only standard-library imports are ever added.
 */
export class PlaygroundFormatter implements SourceFormatter {
  constructor(private readonly api: Pick<PlaygroundApi, "format">) {}

  async format(source: string): Promise<string> {
    let response: FormatResponse;
    try {
      response = await this.api.format(source, true);
    } catch (error) {
      throw new FormatError(`formatter unavailable: ${errorMessage(error)}`, { cause: error });
    }

    const diagnostic = response.Error?.trim() ?? "";
    if (diagnostic) {
      throw new FormatError(diagnostic);
    }
    if (response.Body === undefined) {
      throw new FormatError("formatter returned no source");
    }

    return response.Body;
  }
}

export class SnippetTransformer {
  constructor(private readonly formatter: SourceFormatter) {}

  async transform(text: string, options: TransformOptions = {}): Promise<string> {
    const source = options.wrapBody ? wrapFunctionBody(text) : text;
    return await this.formatter.format(source);
  }
}
