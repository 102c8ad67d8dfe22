import { randomInt } from "crypto";
import { DateTime } from "luxon";

const SUFFIX_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export const CHAT_ID_PATTERN = /^CHAT-\d{14}-[A-Z0-9]{4}$/;

/** CHAT-<yyyyMMddHHmmss>-<4 chars>, timestamp in the support time zone. */
export function generateChatId(now: Date, timeZone: string): string {
  const stamp = DateTime.fromJSDate(now, { zone: timeZone }).toFormat("yyyyLLddHHmmss");
  let suffix = "";
  for (let i = 0; i < 4; i++) suffix += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
  return `CHAT-${stamp}-${suffix}`;
}
