import { spawn } from "child_process";
import path from "path";
import fsExtra from "fs-extra";
import ora from "ora";

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandError extends Error {
  code?: number;
  stdout?: string;
  stderr?: string;
}

export const runCommand = (
  command: string,
  args: string[] = [],
  options: CommandOptions = {},
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk) => {
      stdout += chunk.toString();
    });

    child.stderr.on("data", (chunk) => {
      stderr += chunk.toString();
    });

    child.on("error", (err) => {
      reject(err);
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout: stdout.trim(), stderr: stderr.trim() });
      } else {
        const error: CommandError = new Error(`Command failed: ${command} ${args.join(" ")}`);
        error.code = code ?? undefined;
        error.stdout = stdout;
        error.stderr = stderr;
        reject(error);
      }
    });
  });

export const ensureDir = async (dirPath: string): Promise<void> => {
  await fsExtra.mkdirp(dirPath);
};

export const writeJson = async (filePath: string, data: unknown): Promise<void> => {
  await ensureDir(path.dirname(filePath));
  await fsExtra.writeJson(filePath, data, { spaces: 2 });
};

export const writeText = async (filePath: string, contents: string): Promise<void> => {
  await ensureDir(path.dirname(filePath));
  await fsExtra.writeFile(filePath, contents, "utf8");
};

/** Markdown files below `dir`, as paths relative to it, in a stable order. */
export const listMarkdownFiles = async (dir: string): Promise<string[]> => {
  const found: string[] = [];

  const walk = async (current: string): Promise<void> => {
    const entries = await fsExtra.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }
      const entryPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
      } else if (entry.isFile() && /\.(md|markdown)$/i.test(entry.name)) {
        found.push(path.relative(dir, entryPath).split(path.sep).join("/"));
      }
    }
  };

  await walk(dir);
  return found.sort();
};

export const slugify = (value: string): string =>
  value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

export const sortBy = <T>(
  items: T[],
  key: (item: T) => string | number,
  orderBy: "asc" | "desc" = "asc",
): T[] =>
  [...items].sort((a, b) => {
    const left = key(a);
    const right = key(b);
    const res = left < right ? -1 : left > right ? 1 : 0;
    return orderBy === "asc" ? res : -res;
  });

export { ora };
