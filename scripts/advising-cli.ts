#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { parseCliArgs, type CliOptions } from "../src/advising-cli-args.js";
import { createAdvisingSession, type AdvisingOutputLine } from "../src/advising-session.js";
import { isCatalogError } from "../src/catalog-errors.js";
import { createCatalogQueryApi } from "../src/catalog-query.js";
import { renderCourseDetail, renderCourseList } from "../src/catalog-report.js";
import { loadCatalogFile, renderIngestionSummary, renderIngestionWarning } from "../src/catalog-ingestion.js";

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.filePath) {
    await runOnce(options.filePath, options);
    return;
  }
  if (options.list || options.courses.length > 0) {
    throw new Error("--list and --course require --file.");
  }
  await runInteractive();
}

async function runOnce(filePath: string, options: CliOptions): Promise<void> {
  const loaded = await loadCatalogFile(filePath, {
    onWarning: (warning) => console.error(renderIngestionWarning(warning)),
    onIngested: (result) => console.log(renderIngestionSummary(result, filePath)),
  });

  const catalog = createCatalogQueryApi(loaded.store);
  try {
    if (options.list) {
      printLines(renderCourseList(catalog.listEntities()));
    }
    for (const course of options.courses) {
      printLines(renderCourseDetail(catalog.resolveEntity(course)));
    }
  } finally {
    loaded.store.teardown();
  }
}

async function runInteractive(): Promise<void> {
  const session = createAdvisingSession();
  const rl = createInterface({ input: process.stdin, terminal: false });

  const showPrompt = (): void => {
    if (session.prompt === "menu") {
      printLines(session.menuLines());
    }
    process.stdout.write(session.promptText);
  };

  try {
    showPrompt();
    for await (const line of rl) {
      writeOutput(await session.handleInput(line));
      if (session.exited) {
        return;
      }
      showPrompt();
    }
    // The prompt is still open on the current line.
    process.stdout.write("\n");
    writeOutput(session.endOfInput());
  } finally {
    rl.close();
    session.close();
  }
}

function writeOutput(lines: AdvisingOutputLine[]): void {
  for (const line of lines) {
    if (line.channel === "stderr") {
      console.error(line.text);
    } else {
      console.log(line.text);
    }
  }
}

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

main().catch((error) => {
  if (isCatalogError(error)) {
    console.error(`ERROR: ${error.message}`);
    process.exitCode = 1;
    return;
  }
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
