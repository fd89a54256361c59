import { dedupeAlerts, renderDigest } from "./alerts.js";
import { DEFAULT_LABEL_CONVENTIONS, isNegative, truncateForClassification } from "./decider.js";
import { describeError } from "./errors.js";
import { extractSnippets } from "./extractor.js";
import type { PageFetcher } from "./fetcher.js";
import { logger } from "./logger.js";
import { matchLeader } from "./matcher.js";
import type { Notifier } from "./notifier.js";
import type { SentimentClassifier } from "./sentiment.js";
import type {
  Alert,
  ClassificationResult,
  LabelConvention,
  MonitorConfig,
  RunState,
  RunSummary,
} from "./types.js";

export interface MonitorDependencies {
  fetchPage: PageFetcher;
  classifier: SentimentClassifier;
  notifier: Notifier;
  labelConventions?: readonly LabelConvention[];
  onStateChange?: (state: RunState) => void;
}

type RunOptions = Pick<MonitorConfig, "leaders" | "targetUrls" | "threshold" | "dryRun">;

/**
 * Runs one pass over every target URL and sends a single digest for the
 * negative mentions found. Fetch and classification failures are logged and
 * skipped; the run always reaches `done`.
 */
export async function runMonitor(config: RunOptions, deps: MonitorDependencies): Promise<RunSummary> {
  const enter = (state: RunState) => deps.onStateChange?.(state);
  const conventions = deps.labelConventions ?? DEFAULT_LABEL_CONVENTIONS;
  const summary: RunSummary = {
    urlsScanned: 0,
    urlsFailed: 0,
    snippetsFound: 0,
    snippetsClassified: 0,
    classificationFailures: 0,
    alerts: [],
    digest: null,
    notified: false,
  };
  const collected: Alert[] = [];

  enter({ state: "idle" });
  for (const url of config.targetUrls) {
    const pageLog = logger.child({ url });
    pageLog.info("Checking page");
    enter({ state: "fetching", url });
    summary.urlsScanned += 1;
    let html: string | null;
    try {
      html = await deps.fetchPage(url);
    } catch (error) {
      pageLog.error("Page fetch error", { error: describeError(error) });
      html = null;
    }
    if (!html) {
      summary.urlsFailed += 1;
      continue;
    }

    enter({ state: "extracting", url });
    const snippets = extractSnippets(html, config.leaders);
    summary.snippetsFound += snippets.length;
    pageLog.info("Candidate snippets found", { count: snippets.length });

    for (const snippet of snippets) {
      enter({ state: "matching", url });
      const leader = matchLeader(snippet.text, config.leaders);
      if (!leader) {
        continue;
      }

      enter({ state: "classifying", url, leader });
      let result: ClassificationResult;
      try {
        result = await deps.classifier.classify(truncateForClassification(snippet.text));
      } catch (error) {
        summary.classificationFailures += 1;
        pageLog.error("Sentiment call failed", {
          leader,
          snippet: snippet.text.slice(0, 120),
          error: describeError(error),
        });
        continue;
      }
      summary.snippetsClassified += 1;
      pageLog.info("Snippet classified", { leader, label: result.label, score: result.score });

      enter({ state: "deciding", url, leader });
      if (isNegative(result.label, result.score, config.threshold, conventions)) {
        collected.push({
          leader,
          text: snippet.text,
          context: snippet.context,
          url,
          score: result.score,
        });
      }
    }
  }

  enter({ state: "aggregating" });
  summary.alerts = dedupeAlerts(collected);
  summary.digest = renderDigest(summary.alerts);

  if (!summary.digest) {
    logger.info("No negative comments found", { urls: summary.urlsScanned });
  } else if (config.dryRun) {
    logger.info("Dry run digest", { subject: summary.digest.subject, body: summary.digest.body });
  } else {
    enter({ state: "notifying" });
    try {
      summary.notified = await deps.notifier.send(summary.digest.subject, summary.digest.body);
    } catch (error) {
      logger.error("Notification failed", { alerts: summary.digest.count, error: describeError(error) });
    }
  }

  enter({ state: "done" });
  logger.info("Run complete", {
    urlsScanned: summary.urlsScanned,
    urlsFailed: summary.urlsFailed,
    snippets: summary.snippetsFound,
    alerts: summary.alerts.length,
    notified: summary.notified,
  });
  return summary;
}
