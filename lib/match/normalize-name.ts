import type { PlayerIdentity } from "@/lib/domain/types";

export class InvalidNameError extends Error {
  readonly input: unknown;

  constructor(input: unknown, reason: string) {
    super(`Invalid player name ${JSON.stringify(input)}: ${reason}`);
    this.name = "InvalidNameError";
    this.input = input;
  }
}

const SUFFIXES = new Set(["jr", "sr", "ii", "iii", "iv"]);
const APOSTROPHES = /['\u2018\u2019\u0060\u00B4]/g; // ascii, smart quotes, backtick, acute
const NON_ALNUM = /[^a-z0-9\s]/g;

function tokensOf(raw: unknown): string[] {
  if (typeof raw !== "string") throw new InvalidNameError(raw, "not a string");
  if (raw.trim() === "") throw new InvalidNameError(raw, "empty");

  const base = raw
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "") // strip diacritics
    .toLowerCase()
    .replace(APOSTROPHES, "")
    .replace(/\./g, " ") // "C.J." -> "c j", collapsed below
    .replace(/-/g, "")
    .replace(NON_ALNUM, " ");

  let tokens = base.split(/\s+/).filter(Boolean);
  if (tokens.length > 1 && SUFFIXES.has(tokens[tokens.length - 1] ?? "")) {
    tokens = tokens.slice(0, -1);
  }

  // Runs of single letters are initials: "c j mccollum" -> "cj mccollum"
  const out: string[] = [];
  let initials = "";
  for (const t of tokens) {
    if (t.length === 1) {
      initials += t;
      continue;
    }
    if (initials) out.push(initials);
    initials = "";
    out.push(t);
  }
  if (initials) out.push(initials);

  if (out.length === 0) throw new InvalidNameError(raw, "no letters or digits");
  return out;
}

/**
 * Canonical comparison key for a player display name.
 *
 * "Nikola Jokić" -> "nikola jokic", "C.J. McCollum" -> "cj mccollum",
 * "Jaren Jackson Jr." -> "jaren jackson".
 */
export function normalizeName(raw: unknown): string {
  return tokensOf(raw).join(" ");
}

/** Last name plus first initial, the key of the weakest match tier. */
export function lastNameFirstInitial(raw: unknown): { last: string; initial: string } | null {
  const tokens = tokensOf(raw);
  if (tokens.length < 2) return null;
  const first = tokens[0] ?? "";
  const last = tokens[tokens.length - 1] ?? "";
  return { last, initial: first.charAt(0) };
}

export function makeIdentity(raw: string): PlayerIdentity {
  return {
    rawName: raw,
    normalizedKey: normalizeName(raw),
    displayName: raw.replace(/\s+/g, " ").trim(),
  };
}
