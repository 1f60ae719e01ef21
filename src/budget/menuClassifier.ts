// src/budget/menuClassifier.ts

export type MenuReply =
  | { kind: "finalize" }
  | { kind: "show_best" }
  | { kind: "show_all" }
  | { kind: "back" }
  | { kind: "new_request"; text: string };

export type MenuKind = MenuReply["kind"];

type NavigationKind = Exclude<MenuKind, "new_request">;

const DIGIT_REPLIES: Record<string, NavigationKind | undefined> = {
  "0": "back",
  "1": "finalize",
  "2": "show_best",
  "3": "show_all",
};

const KEYCAPS: Record<string, string> = {
  "0️⃣": "0",
  "1️⃣": "1",
  "2️⃣": "2",
  "3️⃣": "3",
};

/**
 * Only the bare digits 0-3 (or their keycap emoji) are menu navigation.
 * "1 saco", "10" or "opção 2" are requests like any other text.
 */
export function classifyMenuReply(text: string): MenuReply {
  const raw = String(text || "").trim();
  const digit = KEYCAPS[raw] ?? raw;
  const kind = DIGIT_REPLIES[digit];
  if (kind) return { kind };
  return { kind: "new_request", text: raw };
}
