import type { Alert, Digest } from "./types.js";

const DIGEST_SEPARATOR = "---";

function alertKey(alert: Alert): string {
  return JSON.stringify([alert.leader, alert.text, alert.url]);
}

/** Drops alerts repeating an earlier (leader, text, url); first occurrences keep their order. */
export function dedupeAlerts(alerts: readonly Alert[]): Alert[] {
  const seen = new Set<string>();
  const unique: Alert[] = [];
  for (const alert of alerts) {
    const key = alertKey(alert);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(alert);
  }
  return unique;
}

export function renderDigest(alerts: readonly Alert[]): Digest | null {
  if (!alerts.length) {
    return null;
  }
  const lines: string[] = [];
  for (const alert of alerts) {
    lines.push(
      `Leader: ${alert.leader}`,
      `Score: ${alert.score}`,
      `Comment snippet: ${alert.text}`,
      `Post URL: ${alert.url}`,
      DIGEST_SEPARATOR
    );
  }
  return {
    subject: `Negative comments detected (${alerts.length})`,
    body: lines.join("\n"),
    count: alerts.length,
  };
}
