import type { Item } from "./types.js";

const MAX_DISPLAY = 80;
const MIN_BREAK = 60;

/** Short label for an item: its header, or its text cut at a word boundary. */
export function displayText(item: Pick<Item, "header" | "text">): string {
  if (item.header) return item.header;
  const text = item.text.trim().replace(/\s+/g, " ");
  if (text.length <= MAX_DISPLAY) return text;
  const cut = text.lastIndexOf(" ", MAX_DISPLAY);
  const end = cut > MIN_BREAK ? cut : MAX_DISPLAY;
  return `${text.slice(0, end)}...`;
}
