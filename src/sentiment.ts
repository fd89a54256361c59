import { z } from "zod";
import { ClassificationError, describeError } from "./errors.js";
import type { ClassificationResult, SentimentSettings } from "./types.js";

export interface SentimentClassifier {
  classify(text: string): Promise<ClassificationResult>;
}

const ScoredLabel = z.object({
  label: z.string(),
  score: z.number(),
});

// Text-classification endpoints answer either per input ([[...]]) or flat ([...]).
const InferenceResponse = z.union([z.array(z.array(ScoredLabel)), z.array(ScoredLabel)]);

const ErrorResponse = z.object({ error: z.string() });

export function pickTopLabel(payload: unknown): ClassificationResult {
  const failure = ErrorResponse.safeParse(payload);
  if (failure.success) {
    throw new ClassificationError(`Inference endpoint error: ${failure.data.error}`);
  }
  const parsed = InferenceResponse.safeParse(payload);
  if (!parsed.success) {
    throw new ClassificationError("Inference response has an unexpected shape");
  }
  const candidates: Array<z.infer<typeof ScoredLabel>> = [];
  for (const entry of parsed.data) {
    if (Array.isArray(entry)) {
      candidates.push(...entry);
    } else {
      candidates.push(entry);
    }
  }
  let best: ClassificationResult | undefined;
  for (const candidate of candidates) {
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }
  if (!best) {
    throw new ClassificationError("Inference response contained no labels");
  }
  return { label: best.label, score: best.score };
}

export class HostedSentimentClassifier implements SentimentClassifier {
  private readonly url: URL;

  constructor(private readonly settings: SentimentSettings) {
    const base = settings.endpoint.endsWith("/") ? settings.endpoint : `${settings.endpoint}/`;
    this.url = new URL(settings.model, base);
  }

  async classify(text: string): Promise<ClassificationResult> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.settings.token) {
      headers["Authorization"] = `Bearer ${this.settings.token}`;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    let payload: unknown;
    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers,
        body: JSON.stringify({ inputs: text }),
        signal: controller.signal,
      });
      if (!response.ok) {
        const body = await response.text();
        throw new ClassificationError(
          `Inference endpoint failed (${response.status}): ${body.slice(0, 200)}`
        );
      }
      payload = await response.json();
    } catch (error) {
      if (error instanceof ClassificationError) {
        throw error;
      }
      const reason = controller.signal.aborted
        ? `timed out after ${this.settings.timeoutMs}ms`
        : describeError(error);
      throw new ClassificationError(`Inference request failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
    return pickTopLabel(payload);
  }
}
