import matter from "gray-matter";
import { parse as parseToml, stringify as stringifyToml, TomlError } from "smol-toml";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { FrontMatterSyntaxError } from "../errors";

export type FrontMatterFormat = "toml" | "yaml";

export const TOML_DELIMITER = "+++";
export const YAML_DELIMITER = "---";

export interface ParsedDocument {
  format: FrontMatterFormat | null;
  data: Record<string, unknown>;
  body: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date);

export const detectFormat = (source: string): FrontMatterFormat | null => {
  const firstLine = source.replace(/^\uFEFF/, "").split(/\r?\n/, 1)[0]?.trimEnd() ?? "";
  if (firstLine.startsWith(TOML_DELIMITER)) {
    return "toml";
  }
  if (firstLine.startsWith(YAML_DELIMITER)) {
    return "yaml";
  }
  return null;
};

const parseYamlTable = (input: string): Record<string, unknown> => {
  const parsed: unknown = parseYaml(input);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error("front matter must be a mapping of keys to values");
  }
  return parsed;
};

// The block handed to the parsers starts with the newline after the opening
// delimiter, so their line numbers already match the file's.
const locate = (error: unknown): { reason: string; line?: number } => {
  if (error instanceof TomlError) {
    return { reason: error.message.split("\n")[0] ?? error.message, line: error.line };
  }
  if (error instanceof YAMLParseError) {
    const line = error.linePos?.[0].line;
    return { reason: error.message.split("\n")[0] ?? error.message, line };
  }
  return { reason: error instanceof Error ? error.message : String(error) };
};

export const parseFrontMatter = (source: string, file: string): ParsedDocument => {
  const format = detectFormat(source);
  if (!format) {
    return { format: null, data: {}, body: source.replace(/^\uFEFF/, "") };
  }

  try {
    const parsed = matter(source, {
      language: format,
      delimiters: format === "toml" ? TOML_DELIMITER : YAML_DELIMITER,
      engines: {
        toml: (input: string) => parseToml(input),
        yaml: parseYamlTable,
      },
    });
    const data: unknown = parsed.data;
    return {
      format,
      data: isRecord(data) ? { ...data } : {},
      body: parsed.content,
    };
  } catch (error) {
    const { reason, line } = locate(error);
    throw new FrontMatterSyntaxError(file, reason, line);
  }
};

export const stringifyFrontMatter = (data: Record<string, unknown>): string => {
  const defined = Object.fromEntries(Object.entries(data).filter(([, value]) => value !== undefined && value !== null));
  const toml = stringifyToml(defined).trim();
  return toml ? `${TOML_DELIMITER}\n${toml}\n${TOML_DELIMITER}\n` : `${TOML_DELIMITER}\n${TOML_DELIMITER}\n`;
};
