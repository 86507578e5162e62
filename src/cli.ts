import { Command } from "commander";

import { ImageGenerator } from "./ai/image.js";
import { PostGenerator, createChatModel } from "./ai/post.js";
import { loadConfig, loadLinkedInConfig, loadLoggingConfig, loadOAuthConfig } from "./config.js";
import { AppError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { createGitHubClient, fetchRecentCommits } from "./services/github.js";
import { PostHistory } from "./services/history.js";
import { parseImagePayload } from "./services/image-payload.js";
import { LinkedInPublisher } from "./services/linkedin.js";
import { buildAuthorizationUrl, exchangeAuthorizationCode, extractAuthorizationCode } from "./services/linkedin-oauth.js";
import type { Logger } from "./types/index.js";
import { WorkflowStageError, runDailyWorkflow } from "./workflow.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

interface RunOptions {
  dryRun?: boolean;
  image: boolean;
  imagePayload?: string;
}

/**
 * Builds every component from one configuration object and runs the workflow.
 */
async function runAction(options: RunOptions, logger: Logger): Promise<void> {
  const config = loadConfig();

  const octokit = createGitHubClient({ token: config.github.token, logger });
  const history = new PostHistory(config.historyFile, logger);
  const postGenerator = new PostGenerator({ model: createChatModel(config.llm), history, logger });
  const imageGenerator = new ImageGenerator(config.image, logger);
  const publisher = new LinkedInPublisher(config.linkedin, logger);

  const report = await runDailyWorkflow(
    {
      fetchCommits: () =>
        fetchRecentCommits({
          octokit,
          username: config.github.username,
          token: config.github.token,
          lookbackHours: config.github.lookbackHours,
          logger,
        }),
      postGenerator,
      imageGenerator,
      publisher,
      logger,
    },
    {
      dryRun: options.dryRun,
      skipImage: !options.image,
      image: options.imagePayload ? parseImagePayload(options.imagePayload) : undefined,
    }
  );

  if (report.status === "dry-run" && report.postText) {
    process.stdout.write(`${report.postText}\n`);
  }
}

export function describeFailure(error: unknown): string {
  if (error instanceof WorkflowStageError) {
    return error.message;
  }
  if (error instanceof AppError) {
    return `${error.name}: ${error.message}`;
  }
  return `Fatal error: ${errorMessage(error)}`;
}

export function createProgram(logger: Logger): Command {
  const program = new Command();

  program
    .name("commit-digest")
    .description("Turns the last day of GitHub commits into a LinkedIn post")
    .version("1.0.0");

  program
    .command("run", { isDefault: true })
    .description("Fetch commits, generate a post and an image, and publish")
    .option("--dry-run", "generate the post but do not publish it")
    .option("--no-image", "skip image generation and upload")
    .option("--image-payload <value>", "use this image (URL, data URI or base64) instead of generating one")
    .action((options: RunOptions) => runAction(options, logger));

  program
    .command("whoami")
    .description("Resolve and print the LinkedIn author URN")
    .action(async () => {
      const publisher = new LinkedInPublisher(loadLinkedInConfig(), logger);
      const urn = await publisher.resolveAuthorUrn();
      process.stdout.write(`LINKEDIN_PERSON_URN=${urn}\n`);
    });

  program
    .command("auth-url")
    .description("Print the LinkedIn authorization URL")
    .action(() => {
      const { clientId, redirectUri } = loadOAuthConfig();
      process.stdout.write(`${buildAuthorizationUrl({ clientId, redirectUri })}\n`);
    });

  program
    .command("exchange-code")
    .description("Exchange the code in a redirect URL for access and id tokens")
    .argument("<redirectedUrl>", "the full URL LinkedIn redirected to after approval")
    .action(async (redirectedUrl: string) => {
      const tokens = await exchangeAuthorizationCode(loadOAuthConfig(), extractAuthorizationCode(redirectedUrl));
      process.stdout.write(`LINKEDIN_ACCESS_TOKEN=${tokens.accessToken}\n`);
      if (tokens.idToken) {
        process.stdout.write(`LINKEDIN_ID_TOKEN=${tokens.idToken}\n`);
      }
      if (tokens.expiresIn !== undefined) {
        logger.info(`Access token expires in ${tokens.expiresIn} seconds`);
      }
    });

  return program;
}

const SIGNAL_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const;

/**
 * Exits with 128 + signal number on SIGINT and SIGTERM. Returns a function
 * that removes the handlers.
 */
export function handleSignals(logger: Logger, exit: (code: number) => void = (code) => process.exit(code)): () => void {
  const handlers = (["SIGINT", "SIGTERM"] as const).map((signal) => {
    const handler = () => {
      logger.warn(`Workflow interrupted (${signal})`);
      exit(SIGNAL_EXIT_CODES[signal]);
    };
    process.once(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      process.off(signal, handler);
    }
  };
}

/**
 * Entry point: parses arguments, runs the command and sets the exit code.
 */
export async function main(argv: readonly string[] = process.argv): Promise<number> {
  const logging = loadLoggingConfig();
  const logger = createLogger({ level: logging.level, dir: logging.dir });
  const removeSignalHandlers = handleSignals(logger);

  try {
    await createProgram(logger).parseAsync([...argv]);
    return EXIT_OK;
  } catch (error) {
    logger.error(describeFailure(error));
    return EXIT_FAILURE;
  } finally {
    removeSignalHandlers();
  }
}
