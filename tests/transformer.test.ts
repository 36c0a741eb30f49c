import { describe, expect, it, vi } from "vitest";

import { FormatError } from "../src/errors.js";
import type { FormatResponse } from "../src/playground/api.js";
import {
  PlaygroundFormatter,
  SnippetTransformer,
  type SourceFormatter,
  wrapFunctionBody,
} from "../src/playground/transformer.js";

const CANONICAL = 'package main\n\nimport "fmt"\n\nfunc main() {\n\tfmt.Println(1)\n}\n';

function createFormatApi(response: FormatResponse) {
  return { format: vi.fn(async (_source: string, _resolveImports: boolean) => response) };
}

/** Stand-in formatter that only accepts already canonical input. */
class CanonicalOnlyFormatter implements SourceFormatter {
  calls: string[] = [];

  async format(source: string): Promise<string> {
    this.calls.push(source);
    return source === CANONICAL ? source : CANONICAL;
  }
}

describe("wrapFunctionBody", () => {
  it("wraps statements in package main and func main", () => {
    expect(wrapFunctionBody("fmt.Println(1)")).toBe(
      "package main\n\nfunc main() {\nfmt.Println(1)\n}\n",
    );
  });
});

describe("PlaygroundFormatter", () => {
  it("requests import resolution and returns the formatted body", async () => {
    const api = createFormatApi({ Body: CANONICAL, Error: "" });
    const formatter = new PlaygroundFormatter(api);

    await expect(formatter.format("package main")).resolves.toBe(CANONICAL);
    expect(api.format).toHaveBeenCalledWith("package main", true);
  });

  it("turns a formatter diagnostic into FormatError", async () => {
    const formatter = new PlaygroundFormatter(createFormatApi({ Error: "prog.go:4:13: expected ')'\n" }));

    const failure = formatter.format("package main");
    await expect(failure).rejects.toBeInstanceOf(FormatError);
    await expect(failure).rejects.toThrow("could not format / imports source: prog.go:4:13: expected ')'");
  });

  it("reports an unreachable formatter as FormatError", async () => {
    const api = { format: vi.fn(async (): Promise<FormatResponse> => { throw new Error("fetch failed"); }) };
    const formatter = new PlaygroundFormatter(api);

    await expect(formatter.format("package main")).rejects.toThrow(
      "could not format / imports source: formatter unavailable: fetch failed",
    );
  });

  it("rejects a response without a body", async () => {
    const formatter = new PlaygroundFormatter(createFormatApi({ Error: "" }));

    await expect(formatter.format("package main")).rejects.toThrow(
      "could not format / imports source: formatter returned no source",
    );
  });
});

describe("SnippetTransformer", () => {
  it("wraps bodies before formatting when asked", async () => {
    const formatter = new CanonicalOnlyFormatter();
    const transformer = new SnippetTransformer(formatter);

    await expect(transformer.transform("fmt.Println(1)", { wrapBody: true })).resolves.toBe(CANONICAL);
    expect(formatter.calls).toEqual(["package main\n\nfunc main() {\nfmt.Println(1)\n}\n"]);
  });

  it("passes complete programs through unwrapped", async () => {
    const formatter = new CanonicalOnlyFormatter();
    const transformer = new SnippetTransformer(formatter);

    await transformer.transform(CANONICAL);
    expect(formatter.calls).toEqual([CANONICAL]);
  });

  it("is idempotent on canonical source", async () => {
    const transformer = new SnippetTransformer(new CanonicalOnlyFormatter());

    const once = await transformer.transform(CANONICAL);
    const twice = await transformer.transform(once);
    expect(once).toBe(CANONICAL);
    expect(twice).toBe(once);
  });
});
