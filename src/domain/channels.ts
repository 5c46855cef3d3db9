import type { ChatId } from "./typedefs.js";

export function chatChannel(chatId: ChatId): string {
  return `chat:${chatId}`;
}
