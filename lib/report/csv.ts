import type { Assignment, SlotEntry } from "@/lib/opt/types";
import type { Swap } from "@/lib/waiver/comparator";

const ASSIGNMENT_HEADERS = ["slot", "phase", "player", "team", "positions", "score", "rank", "rank_source", "low_confidence"];
const SWAP_HEADERS = ["add", "add_team", "add_positions", "drop", "drop_slot", "basis", "add_weekly_value", "delta"];

/**
 * Formats a value for CSV export
 */
function formatCSVValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "number") {
    return value.toString();
  }

  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }

  if (Array.isArray(value)) {
    return value.join("/");
  }

  return String(value);
}

/**
 * Escapes a field value for CSV format
 */
export function escapeCSVField(value: string): string {
  if (!value) return "";

  // If the value contains comma, quote, or newline, wrap in quotes and escape quotes
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

function toCsv(headers: string[], rows: unknown[][]): string {
  const lines = [headers.map(escapeCSVField).join(",")];
  for (const row of rows) {
    lines.push(row.map((v) => escapeCSVField(formatCSVValue(v))).join(","));
  }
  return lines.join("\n") + "\n";
}

function entryRow(e: SlotEntry): unknown[] {
  const p = e.player;
  return [
    e.slot,
    e.phase,
    p?.identity.displayName,
    p?.team,
    p?.eligiblePositions,
    e.value?.primary,
    p ? e.value?.fallbackRank : null,
    p ? e.value?.rankSource : null,
    e.lowConfidence,
  ];
}

/** Active slots in display order, then bench, then IL. Empty slots keep their row. */
export function assignmentToCsv(a: Assignment): string {
  return toCsv(ASSIGNMENT_HEADERS, [...a.active, ...a.bench, ...a.injured].map(entryRow));
}

export function swapsToCsv(swaps: readonly Swap[]): string {
  return toCsv(
    SWAP_HEADERS,
    swaps.map((s) => [
      s.freeAgent.identity.displayName,
      s.freeAgent.team,
      s.freeAgent.eligiblePositions,
      s.replaces.identity.displayName,
      s.replaceSlot,
      s.basis,
      s.freeAgentWeeklyValue,
      s.valueDelta,
    ])
  );
}
