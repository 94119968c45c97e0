import path from "path";
import fsExtra from "fs-extra";
import lockfile from "proper-lockfile";
import type { BuildMode } from "./render/site";

export interface BuildRecord {
  builtAt: string;
  mode: BuildMode;
  /** Output files, relative to the output directory. */
  files: string[];
}

interface Manifest {
  outputs: Record<string, BuildRecord>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object";

const normalizeBuildRecord = (value: unknown): BuildRecord | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }

  const { builtAt, mode, files } = value;

  if (typeof builtAt !== "string") {
    return undefined;
  }

  if (mode !== "published" && mode !== "drafts") {
    return undefined;
  }

  if (!Array.isArray(files) || files.some((item) => typeof item !== "string")) {
    return undefined;
  }

  return {
    builtAt,
    mode,
    files: files.filter((item): item is string => typeof item === "string"),
  };
};

const normalizeManifest = (raw: unknown): Manifest => {
  if (!isRecord(raw) || !isRecord(raw.outputs)) {
    return { outputs: {} };
  }

  const outputs: Record<string, BuildRecord> = {};
  for (const [key, value] of Object.entries(raw.outputs)) {
    const record = normalizeBuildRecord(value);
    if (record) {
      outputs[key] = record;
    }
  }

  return { outputs };
};

const loadManifest = async (manifestPath: string): Promise<Manifest> => {
  try {
    const raw: unknown = await fsExtra.readJson(manifestPath);
    return normalizeManifest(raw);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return { outputs: {} };
    }
    throw err;
  }
};

const saveManifest = async (manifestPath: string, manifest: Manifest): Promise<void> => {
  await fsExtra.ensureDir(path.dirname(manifestPath));
  await fsExtra.writeJson(manifestPath, manifest, { spaces: 2 });
};

const withLock = async <T>(manifestPath: string, fn: () => Promise<T>): Promise<T> => {
  await fsExtra.ensureDir(path.dirname(manifestPath));

  let release: (() => Promise<void>) | undefined;
  try {
    // The manifest may not exist yet, so lock the path itself.
    release = await lockfile.lock(manifestPath, {
      realpath: false,
      retries: {
        retries: 10,
        minTimeout: 50,
        maxTimeout: 500,
      },
    });

    return await fn();
  } finally {
    if (release) {
      await release();
    }
  }
};

export interface OutputSession {
  /** Records the files this build wrote and returns the ones the last build left behind. */
  commit(record: BuildRecord): Promise<string[]>;
}

/**
 * Runs `fn` while holding the manifest lock for `outputDir`, so two builds
 * into the same directory cannot interleave.
 */
export const withOutputSession = async <T>(
  manifestPath: string,
  outputDir: string,
  fn: (session: OutputSession) => Promise<T>,
): Promise<T> =>
  withLock(manifestPath, async () => {
    const key = path.resolve(outputDir);
    const manifest = await loadManifest(manifestPath);
    const previous = manifest.outputs[key];

    const session: OutputSession = {
      commit: async (record) => {
        const current = new Set(record.files);
        const stale = (previous?.files ?? []).filter((file) => !current.has(file));
        manifest.outputs[key] = record;
        await saveManifest(manifestPath, manifest);
        return stale;
      },
    };

    return fn(session);
  });

export const readBuildRecord = async (manifestPath: string, outputDir: string): Promise<BuildRecord | undefined> => {
  const manifest = await loadManifest(manifestPath);
  return manifest.outputs[path.resolve(outputDir)];
};
