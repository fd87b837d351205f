import { resolveCatalogConfig, type CatalogConfig, type CatalogConfigInput } from "./catalog-config.js";
import { isCatalogError } from "./catalog-errors.js";
import {
  loadCatalogFile,
  renderIngestionSummary,
  renderIngestionWarning,
  type LoadCatalogOptions,
  type LoadedCatalog,
} from "./catalog-ingestion.js";
import { createCatalogQueryApi, type CatalogQueryApi } from "./catalog-query.js";
import { renderCourseDetail, renderCourseList } from "./catalog-report.js";

export type AdvisingPrompt = "menu" | "filename" | "course";

export interface AdvisingOutputLine {
  channel: "stdout" | "stderr";
  text: string;
}

export type CatalogLoader = (filePath: string, options: LoadCatalogOptions) => Promise<LoadedCatalog>;

export interface AdvisingSessionOptions {
  loadCatalog?: CatalogLoader;
  config?: CatalogConfigInput;
}

export interface AdvisingSession {
  readonly prompt: AdvisingPrompt;
  readonly promptText: string;
  readonly dataLoaded: boolean;
  readonly exited: boolean;
  readonly catalog?: CatalogQueryApi;
  menuLines(): string[];
  handleInput(rawLine: string): Promise<AdvisingOutputLine[]>;
  /** Ends the session when input runs out, reporting which prompt was left unanswered. */
  endOfInput(): AdvisingOutputLine[];
  close(): void;
}

export const MENU_LINES = [
  "",
  "================ Advising Assistance Menu ================",
  "  1. Load file data into the data structure",
  "  2. Print an alphanumeric list of all courses",
  "  3. Print course information (title and prerequisites)",
  "  9. Exit the program",
  "==========================================================",
];

const PROMPT_TEXT: Record<AdvisingPrompt, string> = {
  menu: "Enter your choice: ",
  filename: "Enter the filename containing course data (e.g., courses.csv): ",
  course: "Enter the course number to look up (e.g., CSCI300): ",
};

const STREAM_CLOSED_MESSAGE = "ERROR: Input stream closed unexpectedly. Exiting.";

const UNANSWERED_PROMPT_MESSAGE: Partial<Record<AdvisingPrompt, string>> = {
  filename: "ERROR: Failed to read filename.",
  course: "ERROR: Failed to read course number.",
};

export function createAdvisingSession(options: AdvisingSessionOptions = {}): AdvisingSession {
  const config: CatalogConfig = resolveCatalogConfig(options.config);
  const loadCatalog = options.loadCatalog ?? loadCatalogFile;

  let prompt: AdvisingPrompt = "menu";
  let exited = false;
  let catalog: CatalogQueryApi | undefined;

  const stdout = (text: string): AdvisingOutputLine => ({ channel: "stdout", text });
  const stderr = (text: string): AdvisingOutputLine => ({ channel: "stderr", text });

  const releaseCatalog = (): void => {
    catalog?.store.teardown();
    catalog = undefined;
  };

  const handleMenuChoice = (choiceText: string): AdvisingOutputLine[] => {
    if (choiceText.length === 0) {
      return [stdout("Please enter a valid option number.")];
    }

    const choice = Number.parseInt(choiceText, 10);
    if (Number.isNaN(choice)) {
      return [stdout("Invalid input. Please enter 1, 2, 3, or 9.")];
    }

    switch (choice) {
      case 9:
        exited = true;
        releaseCatalog();
        return [stdout("Exiting Advising Assistance Program. Goodbye!")];
      case 1:
        prompt = "filename";
        return [];
      case 2:
        if (!catalog) {
          return [stdout("Please load data (Option 1) before printing the course list.")];
        }
        return renderCourseList(catalog.listEntities()).map(stdout);
      case 3:
        if (!catalog) {
          return [stdout("Please load data (Option 1) before printing course information.")];
        }
        prompt = "course";
        return [];
      default:
        return [stdout("Unknown option. Please enter 1, 2, 3, or 9.")];
    }
  };

  const handleFilename = async (filename: string): Promise<AdvisingOutputLine[]> => {
    prompt = "menu";
    if (filename.length === 0) {
      return [stdout("Filename cannot be empty.")];
    }

    const output: AdvisingOutputLine[] = [];
    releaseCatalog();
    try {
      const loaded = await loadCatalog(filename, {
        config,
        onWarning: (warning) => output.push(stderr(renderIngestionWarning(warning))),
        onIngested: (result) => output.push(stdout(renderIngestionSummary(result, filename))),
      });
      catalog = createCatalogQueryApi(loaded.store, config);
    } catch (error) {
      if (!isCatalogError(error)) {
        throw error;
      }
      output.push(stderr(`ERROR: ${error.message}`));
    }
    return output;
  };

  const handleCourse = (courseNumber: string): AdvisingOutputLine[] => {
    prompt = "menu";
    if (courseNumber.length === 0) {
      return [stdout("Course number cannot be empty.")];
    }
    if (!catalog) {
      return [stdout("Please load data (Option 1) before printing course information.")];
    }
    return renderCourseDetail(catalog.resolveEntity(courseNumber), config.unknownLabelText).map(stdout);
  };

  return {
    get prompt() {
      return prompt;
    },
    get promptText() {
      return PROMPT_TEXT[prompt];
    },
    get dataLoaded() {
      return catalog !== undefined;
    },
    get exited() {
      return exited;
    },
    get catalog() {
      return catalog;
    },
    menuLines: () => MENU_LINES.slice(),
    handleInput: async (rawLine: string): Promise<AdvisingOutputLine[]> => {
      if (exited) {
        return [];
      }
      const input = rawLine.trim();
      switch (prompt) {
        case "filename":
          return handleFilename(input);
        case "course":
          return handleCourse(input);
        default:
          return handleMenuChoice(input);
      }
    },
    endOfInput: (): AdvisingOutputLine[] => {
      if (exited) {
        return [];
      }
      const output: AdvisingOutputLine[] = [];
      const unanswered = UNANSWERED_PROMPT_MESSAGE[prompt];
      if (unanswered) {
        output.push(stderr(unanswered));
      }
      output.push(stderr(STREAM_CLOSED_MESSAGE));
      exited = true;
      releaseCatalog();
      return output;
    },
    close: () => {
      exited = true;
      releaseCatalog();
    },
  };
}
