import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigurationError, formatIssues } from "@stepwright/shared";

export interface WaitConfig {
  minWaitSeconds: number;
  bufferSeconds: number;
  maxWaitSeconds: number;
}

export interface SimplifyConfig {
  labelClipboardPatterns: boolean;
}

export interface ProducerConfig {
  model: string;
  /** Environment variable holding the API key. */
  apiKeyEnv: string;
  baseUrl?: string;
  maxRetries: number;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

export interface OutputConfig {
  dir: string;
  writeText: boolean;
  writeSimplifiedSession: boolean;
}

export interface OrchestratorConfig {
  waits: WaitConfig;
  simplify: SimplifyConfig;
  producer: ProducerConfig;
  output: OutputConfig;
}

export const defaultConfig: OrchestratorConfig = {
  waits: {
    minWaitSeconds: 2.0,
    bufferSeconds: 1.0,
    maxWaitSeconds: 10.0,
  },
  simplify: {
    labelClipboardPatterns: false,
  },
  producer: {
    model: "gpt-4o-mini",
    apiKeyEnv: "OPENAI_API_KEY",
    maxRetries: 2,
    timeoutMs: 60_000,
    temperature: 0.1,
    maxTokens: 4096,
  },
  output: {
    dir: "output",
    writeText: true,
    writeSimplifiedSession: true,
  },
};

const ConfigFileSchema = z.object({
  waits: z
    .object({
      minWaitSeconds: z.number().nonnegative(),
      bufferSeconds: z.number().nonnegative(),
      maxWaitSeconds: z.number().positive(),
    })
    .partial()
    .optional(),
  simplify: z.object({ labelClipboardPatterns: z.boolean() }).partial().optional(),
  producer: z
    .object({
      model: z.string().min(1),
      apiKeyEnv: z.string().min(1),
      baseUrl: z.string().url(),
      maxRetries: z.number().int().nonnegative(),
      timeoutMs: z.number().int().positive(),
      temperature: z.number().min(0).max(2),
      maxTokens: z.number().int().positive(),
    })
    .partial()
    .optional(),
  output: z
    .object({
      dir: z.string().min(1),
      writeText: z.boolean(),
      writeSimplifiedSession: z.boolean(),
    })
    .partial()
    .optional(),
});

export function loadConfig(configPath?: string): OrchestratorConfig {
  if (!configPath) {
    return defaultConfig;
  }

  const resolved = path.resolve(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  let contents: unknown;
  try {
    contents = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid config ${resolved}: ${reason}`);
  }
  const result = ConfigFileSchema.safeParse(contents);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config ${resolved}: ${formatIssues(result.error.issues)}`);
  }
  const parsed = result.data;

  const config: OrchestratorConfig = {
    waits: {
      ...defaultConfig.waits,
      ...(parsed.waits ?? {}),
    },
    simplify: {
      ...defaultConfig.simplify,
      ...(parsed.simplify ?? {}),
    },
    producer: {
      ...defaultConfig.producer,
      ...(parsed.producer ?? {}),
    },
    output: {
      ...defaultConfig.output,
      ...(parsed.output ?? {}),
    },
  };

  if (config.waits.minWaitSeconds > config.waits.maxWaitSeconds) {
    throw new ConfigurationError("waits.minWaitSeconds must not exceed waits.maxWaitSeconds");
  }
  return config;
}
