export { parseArgs } from "./cli/args";
export type { CliArgs } from "./cli/args";
export { runCompile } from "./cli/command";
export type { CompileCommandOptions, CompileCommandResult } from "./cli/command";
export { defaultConfig, loadConfig } from "./config/defaults";
export type {
  OrchestratorConfig,
  OutputConfig,
  ProducerConfig,
  SimplifyConfig,
  WaitConfig,
} from "./config/defaults";
export { convertAction, convertRecording, repairTimestamp, DEFAULT_APPLICATION } from "./ingest/recorder";
export type { RecordingOptions } from "./ingest/recorder";
export { OpenAIWorkflowProducer, createOpenAIProducer } from "./rpc/producerClient";
export type { ChatCompletionsClient, ChatCompletionResult } from "./rpc/producerClient";
export { ArtifactManager } from "./runtime/artifacts";
export type { ArtifactContents, CompileArtifacts, WrittenArtifacts } from "./runtime/artifacts";
