import type { ImageGenerator } from "./ai/image.js";
import type { PostGenerator } from "./ai/post.js";
import { errorMessage } from "./errors.js";
import type { LinkedInPublisher, PublishResult } from "./services/linkedin.js";
import { formatCommitsForAnalysis } from "./services/summary.js";
import type { CommitRecord, ImagePayload, Logger, StageOutcome } from "./types/index.js";

export interface WorkflowDeps {
  fetchCommits: () => Promise<CommitRecord[]>;
  postGenerator: Pick<PostGenerator, "generate">;
  imageGenerator?: Pick<ImageGenerator, "generate">;
  publisher: Pick<LinkedInPublisher, "resolveAuthorUrn" | "publish">;
  logger: Logger;
}

export interface WorkflowOptions {
  /** Stop after generation and report the post without publishing */
  dryRun?: boolean;
  /** Skip the image stage entirely */
  skipImage?: boolean;
  /** Use this image instead of generating one */
  image?: ImagePayload;
  now?: () => number;
}

export interface WorkflowReport {
  status: "published" | "skipped" | "dry-run";
  commitCount: number;
  durationMs: number;
  postText?: string;
  postId?: string;
  imageIncluded: boolean;
  /** Why the image stage produced nothing, when it degraded */
  imageDegradation?: string;
}

/**
 * Raised when a mandatory stage fails; carries the stage for the final log line.
 */
export class WorkflowStageError extends Error {
  constructor(
    public readonly stage: string,
    public readonly elapsedMs: number,
    cause: Error
  ) {
    super(`${stage} failed after ${(elapsedMs / 1000).toFixed(2)}s: ${cause.message}`, { cause });
    this.name = "WorkflowStageError";
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runDailyWorkflow(deps: WorkflowDeps, options: WorkflowOptions = {}): Promise<WorkflowReport> {
  const { logger } = deps;
  const now = options.now ?? Date.now;
  const startedAt = now();
  const elapsed = () => now() - startedAt;

  /**
   * Runs one step, logging entry, exit and duration. Thrown errors become a
   * fatal outcome; the caller decides whether that aborts the run.
   */
  async function runStage<T>(name: string, step: () => Promise<StageOutcome<T>>): Promise<StageOutcome<T>> {
    logger.info(`▶ ${name}`);
    const stageStart = now();
    let outcome: StageOutcome<T>;
    try {
      outcome = await step();
    } catch (error) {
      outcome = { status: "fatal", error: toError(error) };
    }
    const took = `${((now() - stageStart) / 1000).toFixed(2)}s`;
    switch (outcome.status) {
      case "produced":
        logger.info(`✔ ${name} (${took})`);
        break;
      case "degraded":
        logger.warn(`⚠ ${name} degraded (${took}): ${outcome.reason}`);
        break;
      case "fatal":
        logger.error(`✖ ${name} failed (${took}): ${outcome.error.message}`);
        break;
    }
    return outcome;
  }

  async function critical<T>(name: string, step: () => Promise<T>): Promise<T> {
    const outcome = await runStage(name, () =>
      step().then((value): StageOutcome<T> => ({ status: "produced", value }))
    );
    if (outcome.status === "produced") {
      return outcome.value;
    }
    const error = outcome.status === "fatal" ? outcome.error : new Error(outcome.reason);
    logger.error(`Workflow failed at "${name}" after ${(elapsed() / 1000).toFixed(2)} seconds`);
    throw new WorkflowStageError(name, elapsed(), error);
  }

  logger.info("🚀 Starting daily GitHub commit workflow");

  const commits = await critical("Step 1: Fetch GitHub commits", deps.fetchCommits);
  logger.info(`Fetched ${commits.length} commit(s)`);
  if (commits.length === 0) {
    logger.info("No commits found in the lookback window. Skipping post.");
    return { status: "skipped", commitCount: 0, durationMs: elapsed(), imageIncluded: false };
  }
  commits.forEach((commit, i) => {
    logger.info(`  Commit ${i + 1}: ${commit.repository} - ${commit.message.slice(0, 50)}`);
  });

  const summary = await critical("Step 2: Format commits", async () => formatCommitsForAnalysis(commits));
  logger.debug(`Summary length: ${summary.length} characters`);

  const postText = await critical("Step 3: Generate post text", () => deps.postGenerator.generate(summary));
  logger.info(`Generated post:\n${postText}`);

  if (!options.dryRun) {
    const author = await critical("Step 4: Resolve LinkedIn author", () => deps.publisher.resolveAuthorUrn());
    logger.info(`Posting as ${author}`);
  }

  const image = await imageStage(deps, options, postText, runStage);

  if (options.dryRun) {
    logger.info("Dry run: not publishing");
    const reason = image.status === "produced" ? "dry run, image not uploaded" : image.reason;
    return report("dry-run", commits.length, elapsed(), postText, reason, undefined);
  }

  const payload = image.status === "produced" ? image.value : undefined;
  const published = await critical("Step 6: Publish post", () => deps.publisher.publish(postText, payload));

  const result = report(
    "published",
    commits.length,
    elapsed(),
    postText,
    image.status === "degraded" ? image.reason : published.imageDegradation,
    published
  );
  logger.info("📊 Workflow metrics:");
  logger.info(`  Duration: ${(result.durationMs / 1000).toFixed(2)} seconds`);
  logger.info(`  Commits processed: ${result.commitCount}`);
  logger.info(`  Post length: ${postText.length} characters`);
  logger.info(`  Image included: ${result.imageIncluded ? "Yes" : "No"}`);
  logger.info(`✅ Daily workflow completed (post id: ${result.postId || "n/a"})`);
  return result;
}

type StageRunner = <T>(name: string, step: () => Promise<StageOutcome<T>>) => Promise<StageOutcome<T>>;

/**
 * Produces the image to attach, generated or given. Never aborts: a fatal
 * outcome here is logged and treated like a degradation.
 */
async function imageStage(
  deps: WorkflowDeps,
  options: WorkflowOptions,
  postText: string,
  runStage: StageRunner
): Promise<Exclude<StageOutcome<ImagePayload>, { status: "fatal" }>> {
  const outcome = await runStage("Step 5: Generate image", async (): Promise<StageOutcome<ImagePayload>> => {
    if (options.skipImage) {
      return { status: "degraded", reason: "image stage disabled" };
    }
    if (options.image) {
      return { status: "produced", value: options.image };
    }
    if (deps.imageGenerator) {
      return deps.imageGenerator.generate(postText);
    }
    return { status: "degraded", reason: "no image generator configured" };
  });

  if (outcome.status === "fatal") {
    deps.logger.warn(`Continuing with a text-only post: ${errorMessage(outcome.error)}`);
    return { status: "degraded", reason: outcome.error.message };
  }
  return outcome;
}

function report(
  status: WorkflowReport["status"],
  commitCount: number,
  durationMs: number,
  postText: string,
  imageDegradation: string | undefined,
  published: PublishResult | undefined
): WorkflowReport {
  return {
    status,
    commitCount,
    durationMs,
    postText,
    postId: published?.postId,
    imageIncluded: published?.imageIncluded ?? false,
    imageDegradation,
  };
}
