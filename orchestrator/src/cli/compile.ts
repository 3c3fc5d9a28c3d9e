import { parseArgs } from "./args";
import { runCompile } from "./command";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const result = await runCompile(args);
  console.log(result.artifacts.workflowPath);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
