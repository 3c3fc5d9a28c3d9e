export interface CliArgs {
  session?: string;
  recording?: string;
  out?: string;
  config?: string;
  application?: string;
  generative?: boolean;
}

type ValueFlag = "session" | "recording" | "out" | "config" | "application";

const VALUE_FLAGS: readonly ValueFlag[] = ["session", "recording", "out", "config", "application"];

function isValueFlag(key: string): key is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === key);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  let index = 0;

  while (index < argv.length) {
    const token = argv[index];
    if (!token.startsWith("--")) {
      index += 1;
      continue;
    }

    const key = token.slice(2);
    if (key === "generative") {
      args.generative = true;
      index += 1;
      continue;
    }

    if (!isValueFlag(key)) {
      index += 1;
      continue;
    }

    const value = argv[index + 1];
    if (value && !value.startsWith("--")) {
      args[key] = value;
      index += 2;
      continue;
    }

    args[key] = "";
    index += 1;
  }

  return args;
}
