import { generateText, type LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";

import type { LlmConfig } from "../config.js";
import { ConfigError, GenerationError, errorMessage } from "../errors.js";
import { PostHistory, buildExample } from "../services/history.js";
import type { Logger } from "../types/index.js";

/**
 * Input and output fields the model is asked to honour. The descriptions are
 * guidance for the model; nothing checks the output against them.
 */
export const POST_CONTRACT = {
  task: "Generate an engaging LinkedIn post from GitHub commit activity.",
  input: {
    name: "commits_summary",
    description: "Detailed summary of GitHub commits from last 24 hours",
  },
  output: {
    name: "post",
    description:
      "Engaging LinkedIn post (200-300 words, professional yet friendly tone, with emojis used sparingly, includes call-to-action)",
  },
} as const;

const PROMPT_BASE = `<internal_reminder>

1. <writer_info>
    - You write LinkedIn posts for a software developer about their own work.
    - ${POST_CONTRACT.task}
2. <input_field>
    - ${POST_CONTRACT.input.name}: ${POST_CONTRACT.input.description}
3. <output_field>
    - ${POST_CONTRACT.output.name}: ${POST_CONTRACT.output.description}
4. <writer_guidelines>
    - Describe what was built or fixed and why it matters, not file names.
    - Keep a professional, friendly tone.
    - Use emojis sparingly.
    - End with a call-to-action that invites readers to comment or connect.
5. <forming_correct_responses>
    - Reply with the post text ONLY: no preamble, no field labels, no quotes around it.

</internal_reminder>`;

export function buildPostPrompt(commitsSummary: string): string {
  return `${POST_CONTRACT.input.name}:\n${commitsSummary}\n\n${POST_CONTRACT.output.name}:`;
}

/**
 * Builds the chat model for an OpenAI-compatible endpoint (Groq by default)
 */
export function createChatModel(config: LlmConfig): LanguageModel {
  if (!config.apiKey) {
    throw new ConfigError("Language model API key not set. Set LLM_API_KEY.");
  }
  const provider = createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    compatibility: "compatible",
  });
  return provider.chat(config.model);
}

export interface PostGeneratorOptions {
  model: LanguageModel;
  history: PostHistory;
  logger: Logger;
}

export class PostGenerator {
  private readonly model: LanguageModel;
  private readonly history: PostHistory;
  private readonly logger: Logger;

  constructor({ model, history, logger }: PostGeneratorOptions) {
    this.model = model;
    this.history = history;
    this.logger = logger;
  }

  /**
   * Writes a post for the summary and records the pair in the history log
   */
  async generate(commitsSummary: string): Promise<string> {
    const examples = await this.history.load();
    if (examples.length > 0) {
      this.logger.info(`Post history holds ${examples.length} past example(s)`);
    }

    this.logger.info("Generating LinkedIn post...");
    let text: string;
    try {
      ({ text } = await generateText({
        model: this.model,
        system: PROMPT_BASE,
        prompt: buildPostPrompt(commitsSummary),
      }));
    } catch (error) {
      throw new GenerationError(`Post generation failed: ${errorMessage(error)}`, { cause: error });
    }

    const post = stripOutputLabel(text.trim());
    if (!post) {
      throw new GenerationError("Post generation returned an empty response");
    }

    const example = buildExample(commitsSummary, post);
    this.logger.info(
      `Post generated (length: ${example.metrics.outputLength} chars, ${example.metrics.wordCount} words)`
    );
    await this.history.append(example);

    return post;
  }
}

/**
 * Models sometimes echo the output field name back; drop it.
 */
function stripOutputLabel(text: string): string {
  const label = `${POST_CONTRACT.output.name}:`;
  return text.toLowerCase().startsWith(label) ? text.slice(label.length).trim() : text;
}
