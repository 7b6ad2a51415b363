import type { Word } from "./types.js";

export function splitWords(text: string): Word[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return [];
  }
  return trimmed.split(/\s+/u);
}
