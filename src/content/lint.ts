export type MarkdownRule = "unclosed-fence" | "malformed-link";

export interface MarkdownIssue {
  rule: MarkdownRule;
  /** 1-based, relative to the first line passed in. */
  line: number;
  message: string;
}

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})/;
const CODE_SPAN = /`[^`]*`/g;
const EMPTY_TARGET = /!?\[[^\]]*\]\(\s*\)/;
const UNCLOSED_TARGET = /!?\[[^\]]+\]\([^)]*$/;

interface OpenFence {
  marker: string;
  line: number;
}

const closesFence = (line: string, fence: OpenFence): boolean => {
  const trimmed = line.replace(/^ {0,3}/, "").trimEnd();
  const char = fence.marker[0] ?? "`";
  return trimmed.length >= fence.marker.length && [...trimmed].every((c) => c === char);
};

const lintLinks = (line: string, lineNumber: number): MarkdownIssue[] => {
  const text = line.replace(CODE_SPAN, "");
  if (EMPTY_TARGET.test(text)) {
    return [{ rule: "malformed-link", line: lineNumber, message: "link has an empty target" }];
  }
  if (UNCLOSED_TARGET.test(text)) {
    return [{ rule: "malformed-link", line: lineNumber, message: "link target is missing a closing parenthesis" }];
  }
  return [];
};

/**
 * Structural checks a renderer can survive: they degrade output but never
 * stop a build. Lines inside code fences are not checked for links.
 */
export const lintMarkdown = (body: string): MarkdownIssue[] => {
  const issues: MarkdownIssue[] = [];
  let fence: OpenFence | null = null;

  const lines = body.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? "";
    const lineNumber = index + 1;
    if (fence) {
      if (closesFence(line, fence)) {
        fence = null;
      }
      continue;
    }
    const open = FENCE_OPEN.exec(line);
    if (open?.[1]) {
      fence = { marker: open[1], line: lineNumber };
      continue;
    }
    issues.push(...lintLinks(line, lineNumber));
  }

  if (fence) {
    const { line, marker } = fence;
    issues.push({ rule: "unclosed-fence", line, message: `code fence opened with ${marker} is never closed` });
  }

  return issues;
};
