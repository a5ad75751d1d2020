/**
 * Context assembly: ranked candidates → bounded text for the narrative
 * generator.
 *
 * One line per candidate, in rank order. Assembly stops at the first line
 * that would overflow the budget; that line and all later ones are
 * counted as dropped. A line is never cut.
 */

import type { AssembledContext, RankedCandidate } from "@transit-vibes/types";
import { InvalidInputError } from "../errors/index.js";

/** Supporting nodes listed per line */
const MAX_SUPPORTING_PER_ENTRY = 3;

const SEPARATOR = "\n";

function describeNode(candidate: RankedCandidate): string[] {
  const { node } = candidate;
  switch (node.kind) {
    case "poi": {
      const parts: string[] = [];
      if (node.category) parts.push(node.category);
      if (node.tags.length > 0) parts.push(`tags: ${node.tags.join(", ")}`);
      return parts;
    }
    case "stop":
      return ["transit stop"];
    case "route":
      return [`${node.mode.toLowerCase()} line ${node.shortName}`];
  }
}

function describeSupporting(candidate: RankedCandidate): string | null {
  if (candidate.supporting.length === 0) return null;
  const shown = candidate.supporting.slice(0, MAX_SUPPORTING_PER_ENTRY).map((s) => {
    const km = s.cumulativeWeight.toFixed(2);
    return s.ref.kind === "route" ? `${s.name} (route)` : `${s.name} (${s.ref.kind}, ${km})`;
  });
  const more = candidate.supporting.length - shown.length;
  return `near: ${shown.join(", ")}${more > 0 ? ` +${more} more` : ""}`;
}

/** Render one candidate as a single compact line. */
export function formatCandidate(candidate: RankedCandidate, rank: number): string {
  const parts = [`${rank}. ${candidate.node.name}`, ...describeNode(candidate)];
  const supporting = describeSupporting(candidate);
  if (supporting) parts.push(supporting);
  parts.push(`match ${candidate.combinedScore.toFixed(2)}`);
  return parts.join(" | ");
}

/**
 * Concatenate candidate lines until the next one would exceed
 * `maxContextChars`.
 */
export function assemble(candidates: RankedCandidate[], maxContextChars: number): AssembledContext {
  if (!Number.isInteger(maxContextChars) || maxContextChars < 0) {
    throw new InvalidInputError(`maxContextChars must be a non-negative integer, got ${maxContextChars}`);
  }

  const lines: string[] = [];
  let length = 0;

  for (let i = 0; i < candidates.length; i++) {
    const candidate = candidates[i];
    if (!candidate) break;
    const line = formatCandidate(candidate, i + 1);
    const added = (lines.length > 0 ? SEPARATOR.length : 0) + line.length;
    if (length + added > maxContextChars) break;
    lines.push(line);
    length += added;
  }

  return {
    text: lines.join(SEPARATOR),
    includedCount: lines.length,
    droppedCount: candidates.length - lines.length,
  };
}
