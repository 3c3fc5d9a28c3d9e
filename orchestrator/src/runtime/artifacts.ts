import fs from "fs/promises";
import path from "path";
import { SessionTimeline, WorkflowDefinition, serializeWorkflow } from "@stepwright/shared";
import { formatWorkflowAsText } from "@stepwright/synthesizer";

export interface CompileArtifacts {
  runId: string;
  runDir: string;
  createdAt: string;
}

export interface WrittenArtifacts {
  workflowPath: string;
  textPath?: string;
  simplifiedSessionPath?: string;
}

export interface ArtifactContents {
  workflow: WorkflowDefinition;
  simplifiedSession?: SessionTimeline;
  writeText: boolean;
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]+/g, "-");
}

export class ArtifactManager {
  private baseDir: string;
  private now: () => Date;

  constructor(baseDir: string, now: () => Date = () => new Date()) {
    this.baseDir = baseDir;
    this.now = now;
  }

  async createRunFolder(sessionId: string): Promise<CompileArtifacts> {
    const createdAt = this.now().toISOString();
    const safeTimestamp = createdAt.replace(/[:.]/g, "-");
    const runId = safeSegment(sessionId);
    const runDir = path.resolve(this.baseDir, `${safeTimestamp}_${runId}`);

    await fs.mkdir(runDir, { recursive: true });

    return { runId, runDir, createdAt };
  }

  async write(run: CompileArtifacts, contents: ArtifactContents): Promise<WrittenArtifacts> {
    const workflowPath = path.join(run.runDir, "workflow.json");
    await fs.writeFile(workflowPath, `${serializeWorkflow(contents.workflow)}\n`, "utf-8");
    const written: WrittenArtifacts = { workflowPath };

    if (contents.writeText) {
      written.textPath = path.join(run.runDir, "workflow.txt");
      await fs.writeFile(written.textPath, `${formatWorkflowAsText(contents.workflow)}\n`, "utf-8");
    }

    if (contents.simplifiedSession) {
      written.simplifiedSessionPath = path.join(run.runDir, "session.simplified.json");
      await fs.writeFile(
        written.simplifiedSessionPath,
        `${JSON.stringify(contents.simplifiedSession, null, 2)}\n`,
        "utf-8",
      );
    }

    return written;
  }
}
