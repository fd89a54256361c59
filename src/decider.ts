import type { LabelConvention } from "./types.js";

export const MAX_CLASSIFIER_INPUT = 512;

// Readable labels ("NEGATIVE", "negative") and the placeholder code some
// fine-tuned checkpoints emit for the negative class.
export const DEFAULT_LABEL_CONVENTIONS: readonly LabelConvention[] = [
  { kind: "contains", fragment: "neg" },
  { kind: "exact", label: "LABEL_0" },
];

export function labelMatches(label: string, convention: LabelConvention): boolean {
  switch (convention.kind) {
    case "contains":
      return label.toLowerCase().includes(convention.fragment.toLowerCase());
    case "exact":
      return label === convention.label;
  }
}

export function isNegative(
  label: string,
  score: number,
  threshold: number,
  conventions: readonly LabelConvention[] = DEFAULT_LABEL_CONVENTIONS
): boolean {
  if (!Number.isFinite(score) || score < threshold) {
    return false;
  }
  return conventions.some((convention) => labelMatches(label, convention));
}

/** Keeps the first `limit` code points, so a surrogate pair is never split. */
export function truncateForClassification(text: string, limit = MAX_CLASSIFIER_INPUT): string {
  const chars = Array.from(text);
  return chars.length > limit ? chars.slice(0, limit).join("") : text;
}
