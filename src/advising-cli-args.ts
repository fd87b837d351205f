export interface CliOptions {
  filePath?: string;
  list: boolean;
  courses: string[];
}

export function parseCliArgs(argv: string[]): CliOptions {
  const parsed: CliOptions = {
    list: false,
    courses: [],
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--list") {
      parsed.list = true;
      continue;
    }
    if (arg.startsWith("--file=")) {
      parsed.filePath = requireFilePath(arg.slice("--file=".length));
      continue;
    }
    if (arg === "--file") {
      parsed.filePath = requireFilePath(argv[index + 1]);
      index += 1;
      continue;
    }
    if (arg.startsWith("--course=")) {
      parsed.courses.push(arg.slice("--course=".length));
      continue;
    }
    if (arg === "--course") {
      parsed.courses.push(argv[index + 1] ?? "");
      index += 1;
      continue;
    }
    throw new Error(`Unsupported argument '${arg}'.`);
  }

  return parsed;
}

function requireFilePath(value: string | undefined): string {
  const filePath = value?.trim() ?? "";
  if (filePath.length === 0 || filePath.startsWith("--")) {
    throw new Error("--file requires a path.");
  }
  return filePath;
}
