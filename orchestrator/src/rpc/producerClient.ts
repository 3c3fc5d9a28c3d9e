import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { ConfigurationError, GenerativeResponseError, Logger, createLogger } from "@stepwright/shared";
import type { WorkflowProducer, WorkflowProducerRequest } from "@stepwright/synthesizer";
import { ProducerConfig } from "../config/defaults";

export interface ChatCompletionResult {
  model?: string;
  choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the OpenAI client the producer calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionResult>;
    };
  };
}

const SYSTEM_PROMPT =
  "You convert recorded user sessions into replayable workflow definitions. Reply with a single JSON object.";

export class OpenAIWorkflowProducer implements WorkflowProducer {
  private client: ChatCompletionsClient;
  private config: ProducerConfig;
  private logger: Logger;

  constructor(config: ProducerConfig, client: ChatCompletionsClient, logger: Logger = createLogger("producer")) {
    this.config = config;
    this.client = client;
    this.logger = logger;
  }

  async generate(request: WorkflowProducerRequest): Promise<string> {
    const startedAt = Date.now();
    const completion = await this.client.chat.completions.create({
      model: this.config.model,
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: request.prompt },
      ],
    });

    const content = completion.choices[0]?.message.content ?? "";
    this.logger.info(
      {
        session_id: request.session.session_id,
        model: completion.model ?? this.config.model,
        duration_ms: Date.now() - startedAt,
        characters: content.length,
      },
      "producer responded",
    );
    if (!content.trim()) {
      throw new GenerativeResponseError("Producer returned an empty response", content);
    }
    return content;
  }
}

/**
 * Producer backed by the OpenAI SDK. Retries and timeouts are the SDK's,
 * configured from `maxRetries` and `timeoutMs`.
 */
export function createOpenAIProducer(
  config: ProducerConfig,
  env: NodeJS.ProcessEnv = process.env,
): OpenAIWorkflowProducer {
  const apiKey = env[config.apiKeyEnv];
  if (!apiKey) {
    throw new ConfigurationError(`Missing API key: set ${config.apiKeyEnv}`);
  }
  const client = new OpenAI({
    apiKey,
    baseURL: config.baseUrl,
    maxRetries: config.maxRetries,
    timeout: config.timeoutMs,
  });
  return new OpenAIWorkflowProducer(config, client);
}
