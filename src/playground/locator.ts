import { SnippetFetchError, SnippetNotFound, UnresolvableReference, errorMessage } from "../errors.js";
import type { PlaygroundApi, SnippetDownload } from "./api.js";

const SHARE_URL_PATTERN =
  /^(?:https?:\/\/)?(?:play\.golang\.org\/p|go\.dev\/play\/p)\/(?<id>[A-Za-z0-9_-]{8,}(?:\.go)?)$/;
const BARE_ID_PATTERN = /^[A-Za-z0-9]{8,}(?:\.go)?$/;

/**
 * Extract the snippet id from a share URL or a bare id, or null when the
 * reference is neither.
 */
export function extractSnippetId(reference: string): string | null {
  const trimmed = reference.trim();

  const urlMatch = trimmed.match(SHARE_URL_PATTERN);
  if (urlMatch?.groups) {
    return urlMatch.groups.id;
  }

  if (BARE_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }

  return null;
}

export class SnippetLocator {
  constructor(private readonly api: Pick<PlaygroundApi, "download">) {}

  /**
   * Resolve a share URL or snippet id to its source text, verbatim.
   * Throws UnresolvableReference without touching the network when the
   * reference cannot name a snippet.
   */
  async locate(reference: string): Promise<string> {
    const snippetId = extractSnippetId(reference);
    if (snippetId === null) {
      throw new UnresolvableReference(reference);
    }

    const snippetFile = snippetId.endsWith(".go") ? snippetId : `${snippetId}.go`;

    let download: SnippetDownload;
    try {
      download = await this.api.download(snippetFile);
    } catch (error) {
      throw new SnippetFetchError(`unable to fetch snippet ${snippetFile}: ${errorMessage(error)}`, { cause: error });
    }

    if (download.kind === "missing") {
      throw new SnippetNotFound(snippetId);
    }

    return download.source;
  }
}
