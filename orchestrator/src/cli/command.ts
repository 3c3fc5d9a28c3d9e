import fs from "fs";
import path from "path";
import {
  ConfigurationError,
  SessionTimeline,
  WorkflowDefinition,
  createLogger,
  parseSession,
} from "@stepwright/shared";
import { WorkflowCompiler, WorkflowProducer } from "@stepwright/synthesizer";
import { CliArgs } from "./args";
import { ProducerConfig, loadConfig } from "../config/defaults";
import { convertRecording } from "../ingest/recorder";
import { createOpenAIProducer } from "../rpc/producerClient";
import { ArtifactManager, WrittenArtifacts } from "../runtime/artifacts";

const log = createLogger("cli");

export interface CompileCommandOptions {
  createProducer?: (config: ProducerConfig) => WorkflowProducer;
  now?: () => Date;
}

export interface CompileCommandResult {
  workflow: WorkflowDefinition;
  runDir: string;
  artifacts: WrittenArtifacts;
}

function readJsonFile(filePath: string): unknown {
  const resolved = path.resolve(filePath);
  const raw = fs.readFileSync(resolved, "utf-8");
  return JSON.parse(raw);
}

function loadInput(args: CliArgs, now?: () => Date): SessionTimeline {
  if (args.session && args.recording) {
    throw new ConfigurationError("Pass only one of --session or --recording");
  }
  if (args.session) {
    return parseSession(readJsonFile(args.session));
  }
  if (args.recording) {
    return convertRecording(readJsonFile(args.recording), {
      application: args.application || undefined,
      now,
    });
  }
  throw new ConfigurationError("Missing required argument: --session or --recording");
}

export async function runCompile(
  args: CliArgs,
  options: CompileCommandOptions = {},
): Promise<CompileCommandResult> {
  const config = loadConfig(args.config);
  const session = loadInput(args, options.now);
  const compiler = new WorkflowCompiler({
    waits: config.waits,
    simplify: config.simplify,
    now: options.now,
  });

  let workflow: WorkflowDefinition;
  if (args.generative) {
    const createProducer = options.createProducer ?? ((producerConfig) => createOpenAIProducer(producerConfig));
    workflow = await compiler.compileWithProducer(session, createProducer(config.producer));
  } else {
    workflow = compiler.compileFromEvents(session);
  }

  const manager = new ArtifactManager(args.out || config.output.dir, options.now);
  const run = await manager.createRunFolder(session.session_id);
  const artifacts = await manager.write(run, {
    workflow,
    writeText: config.output.writeText,
    simplifiedSession: config.output.writeSimplifiedSession ? compiler.simplify(session) : undefined,
  });

  log.info({ run_dir: run.runDir, steps: workflow.steps.length }, "wrote workflow artifacts");
  return { workflow, runDir: run.runDir, artifacts };
}
