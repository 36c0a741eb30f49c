/** One PRIVMSG as delivered by the transport. */
export interface InboundLine {
  /** Channel name, or the bot's own nick for a private message. */
  target: string;
  /** `nick!user@host` prefix (or a bare nick) of the sender. */
  sender: string;
  text: string;
}

/** Where and to whom the replies of one invocation go. */
export interface ReplyContext {
  replyTarget: string;
  senderNick: string;
  isPrivate: boolean;
}

/**
 * Sends one line for the given context. Verbs in `template` (`%s`, `%d`,
 * `%q`, `%%`) are only expanded when `args` are given.
 */
export type ReplySender = (context: ReplyContext, template: string, ...args: unknown[]) => Promise<void>;

export function formatReply(template: string, args: readonly unknown[]): string {
  if (args.length === 0) {
    return template;
  }

  let next = 0;
  return template.replace(/%([sdq%])/g, (verb: string, kind: string) => {
    if (kind === "%") {
      return "%";
    }
    if (next >= args.length) {
      return verb;
    }

    const value = args[next];
    next += 1;
    if (kind === "q") {
      return JSON.stringify(String(value));
    }
    return String(value);
  });
}
