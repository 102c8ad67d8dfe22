import type { MessageKind } from "../types/helpdesk";
import { ValidationError } from "../utils/errors";

export const MAX_MESSAGE_LENGTH = 2000;

const EMOTICONS: Record<string, string> = {
  ":)": "🙂",
  ":(": "🙁",
  ":D": "😄",
  ":P": "😛",
  ":o": "😮",
  ":/": "🫤",
  ":|": "😐",
  ";)": "😉",
  "<3": "❤️",
  "</3": "💔",
  ":thumbsup:": "👍",
  ":thumbsdown:": "👎",
};

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Only standalone emoticons are replaced, so "http://..." stays intact.
const EMOTICON_RE = new RegExp(
  `(?<=^|\\s)(${Object.keys(EMOTICONS)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|")})(?=$|\\s)`,
  "g"
);

const EMOJI_ONLY_RE = /^[\p{Extended_Pictographic}\u{1F3FB}-\u{1F3FF}\u200D\uFE0F\s]+$/u;
const PICTOGRAPH_RE = /\p{Extended_Pictographic}/u;

export function normalizeContent(raw: string): string {
  const content = raw.trim();
  if (!content) throw new ValidationError("Message cannot be empty");
  if (content.length > MAX_MESSAGE_LENGTH) {
    throw new ValidationError(`Message too long (max ${MAX_MESSAGE_LENGTH} characters)`);
  }
  return content.replace(EMOTICON_RE, (match) => EMOTICONS[match] ?? match);
}

export function classifyContent(content: string): Exclude<MessageKind, "system"> {
  return EMOJI_ONLY_RE.test(content) && PICTOGRAPH_RE.test(content) ? "emoji" : "text";
}
