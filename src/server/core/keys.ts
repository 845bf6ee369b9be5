export type KeyKind = "boundary" | "digit" | "delete" | "char" | "ignored";

/** One key press as reported by the keystroke source. */
export interface KeyEvent {
  /** `space`, `enter`, `backspace`, or the character itself. */
  name: string;
  /** Identifier of the focused window, passed through to corrections. */
  target?: string;
}

const BOUNDARY_KEYS = new Set([
  "space", "enter", "return", "tab",
  " ", "\n", "\r", "\t",
  ".", ",", "?", "!", ";", ":",
  "(", ")", "[", "]", "{", "}", "<", ">",
  "\"", "'", "`",
]);

const DELETE_KEYS = new Set(["backspace", "delete"]);

const DIGIT = /^\p{Nd}$/u;
const PRINTABLE = /^[^\p{C}\p{Z}]$/u;

export function classifyKey(name: string): KeyKind {
  if (BOUNDARY_KEYS.has(name)) return "boundary";
  if (DELETE_KEYS.has(name)) return "delete";
  if (DIGIT.test(name)) return "digit";
  if (PRINTABLE.test(name)) return "char";
  return "ignored";
}
