import type { LeaderName } from "./types.js";

/**
 * Returns the first leader, in configuration order, whose name occurs in the
 * text (case-insensitive). When a snippet names several leaders the earlier
 * configured one wins.
 */
export function matchLeader(snippetText: string, leaders: readonly LeaderName[]): LeaderName | undefined {
  const lower = snippetText.toLowerCase();
  return leaders.find((leader) => leader.length > 0 && lower.includes(leader.toLowerCase()));
}
