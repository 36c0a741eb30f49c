/**
 * Thin HTTP client for the Go Playground endpoints the bot relies on:
 * `/compile`, `/share`, `/fmt` and `/p/<id>.go`.
 *
 * Every call carries an abort timeout; responses are validated before they
 * leave this module.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { PlaygroundHttpError } from "../errors.js";
import { DEFAULT_PLAYGROUND_TIMEOUT_MS, DEFAULT_PLAYGROUND_URL } from "../config/bot-config.js";

const USER_AGENT = "goplay-irc/0.1";

const CompileEventSchema = Type.Object({
  Message: Type.String(),
  Kind: Type.Optional(Type.String()),
  Delay: Type.Optional(Type.Number()),
});

const CompileResponseSchema = Type.Object({
  Errors: Type.Optional(Type.String()),
  Events: Type.Optional(Type.Union([Type.Array(CompileEventSchema), Type.Null()])),
  VetErrors: Type.Optional(Type.String()),
});

const FormatResponseSchema = Type.Object({
  Body: Type.Optional(Type.String()),
  Error: Type.Optional(Type.String()),
});

export type CompileResponse = Static<typeof CompileResponseSchema>;
export type FormatResponse = Static<typeof FormatResponseSchema>;

export interface PlaygroundApiOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export type SnippetDownload =
  | { kind: "found"; source: string }
  | { kind: "missing" };

export class PlaygroundApi {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PlaygroundApiOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_PLAYGROUND_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PLAYGROUND_TIMEOUT_MS;
    this.fetchImpl = getFetch(options.fetchImpl);
  }

  async compile(source: string): Promise<CompileResponse> {
    const response = await this.request("POST", "/compile", {
      contentType: "application/x-www-form-urlencoded",
      body: new URLSearchParams({ version: "2", body: source, withVet: "true" }).toString(),
    });
    const body = await response.text();
    if (!response.ok) {
      throw new PlaygroundHttpError("/compile", response.status, body.trim());
    }

    return decodeJson(CompileResponseSchema, body, "/compile");
  }

  /** Store the source and return its share URL. */
  async share(source: string): Promise<string> {
    const response = await this.request("POST", "/share", {
      contentType: "text/plain; charset=utf-8",
      body: source,
    });
    const body = (await response.text()).trim();
    if (!response.ok) {
      throw new PlaygroundHttpError("/share", response.status, body);
    }
    if (!/^[A-Za-z0-9_-]+$/.test(body)) {
      throw new Error(`Playground /share returned an unexpected snippet id: ${JSON.stringify(body)}`);
    }

    return `${this.baseUrl}/p/${body}`;
  }

  async format(source: string, resolveImports: boolean): Promise<FormatResponse> {
    const response = await this.request("POST", "/fmt", {
      contentType: "application/x-www-form-urlencoded",
      body: new URLSearchParams({ body: source, imports: String(resolveImports) }).toString(),
    });
    const body = await response.text();
    if (!response.ok) {
      throw new PlaygroundHttpError("/fmt", response.status, body.trim());
    }

    return decodeJson(FormatResponseSchema, body, "/fmt");
  }

  /** Fetch raw snippet source; `snippetFile` is the id including its `.go` suffix. */
  async download(snippetFile: string): Promise<SnippetDownload> {
    const response = await this.request("GET", `/p/${encodeURIComponent(snippetFile)}`);
    const body = await response.text();

    if (response.status === 404) {
      return { kind: "missing" };
    }
    if (response.status !== 200) {
      throw new PlaygroundHttpError(`/p/${snippetFile}`, response.status, "");
    }

    return { kind: "found", source: body };
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    payload?: { contentType: string; body: string },
  ): Promise<Response> {
    const headers: Record<string, string> = { "User-Agent": USER_AGENT };
    if (payload) {
      headers["Content-Type"] = payload.contentType;
    }

    return await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: payload?.body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}

function decodeJson<T extends TSchema>(
  schema: T,
  body: string,
  endpoint: string,
): Static<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new Error(`Playground ${endpoint} returned invalid JSON: ${body.slice(0, 200)}`, { cause: error });
  }

  if (!Value.Check(schema, parsed)) {
    const first = Value.Errors(schema, parsed).First();
    throw new Error(`Playground ${endpoint} returned an unexpected payload: ${first?.path ?? ""} ${first?.message ?? ""}`.trim());
  }

  return parsed;
}

function getFetch(fetchImpl?: typeof fetch): typeof fetch {
  const resolved = fetchImpl ?? globalThis.fetch;
  if (!resolved) {
    throw new Error("Global fetch API is unavailable.");
  }
  return resolved;
}
