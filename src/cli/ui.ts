import { ora } from "../utils";

export interface Logger {
  start(text: string): void;
  update(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
  info(text: string): void;
  warn(text: string): void;
  isVerbose(): boolean;
}

export const createLogger = (verbose: boolean): Logger => {
  const spinner = verbose ? null : ora();

  return {
    start: (text: string) => {
      if (spinner) {
        spinner.start(text);
      } else {
        console.log(text);
      }
    },
    update: (text: string) => {
      if (spinner) {
        spinner.text = text;
      } else {
        console.log(text);
      }
    },
    succeed: (text: string) => {
      if (spinner) {
        spinner.succeed(text);
      } else {
        console.log(text);
      }
    },
    fail: (text: string) => {
      if (spinner) {
        spinner.fail(text);
      } else {
        console.error(text);
      }
    },
    info: (text: string) => {
      if (spinner) {
        spinner.info(text);
      } else {
        console.log(text);
      }
    },
    warn: (text: string) => {
      if (spinner) {
        spinner.warn(text);
      } else {
        console.warn(text);
      }
    },
    isVerbose: () => verbose,
  };
};

/** A logger that records messages instead of printing them. */
export const createMemoryLogger = (): Logger & { lines: string[] } => {
  const lines: string[] = [];
  const record = (level: string) => (text: string) => {
    lines.push(`${level}: ${text}`);
  };
  return {
    lines,
    start: record("start"),
    update: record("update"),
    succeed: record("succeed"),
    fail: record("fail"),
    info: record("info"),
    warn: record("warn"),
    isVerbose: () => true,
  };
};
