export interface FieldIssue {
  file: string;
  field: string;
  message: string;
}

export class ContentError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(message);
    this.name = "ContentError";
    this.file = file;
  }
}

export class FrontMatterSyntaxError extends ContentError {
  readonly line?: number;

  constructor(file: string, reason: string, line?: number) {
    const where = line !== undefined ? `${file}:${line}` : file;
    super(file, `${where}: invalid front matter: ${reason}`);
    this.name = "FrontMatterSyntaxError";
    this.line = line;
  }
}

export class PostValidationError extends ContentError {
  readonly issues: FieldIssue[];

  constructor(file: string, issues: FieldIssue[]) {
    super(file, issues.map((issue) => `${issue.file}: ${issue.field}: ${issue.message}`).join("\n"));
    this.name = "PostValidationError";
    this.issues = issues;
  }
}

export class DuplicateSlugError extends ContentError {
  readonly slug: string;
  readonly files: string[];

  constructor(slug: string, files: string[]) {
    super(files[0] ?? "", `slug '${slug}' is used by more than one post: ${files.join(", ")}`);
    this.name = "DuplicateSlugError";
    this.slug = slug;
    this.files = files;
  }
}

export class ContentBuildError extends Error {
  readonly errors: ContentError[];

  constructor(errors: ContentError[]) {
    const noun = errors.length === 1 ? "error" : "errors";
    super(`Content check failed with ${errors.length} ${noun}`);
    this.name = "ContentBuildError";
    this.errors = errors;
  }
}

export const isContentError = (error: unknown): error is ContentError => error instanceof ContentError;

export const isContentBuildError = (error: unknown): error is ContentBuildError =>
  error instanceof ContentBuildError;

/** One line per failure, each prefixed with the file it came from. */
export const describeErrors = (error: unknown): string[] => {
  if (isContentBuildError(error)) {
    return error.errors.flatMap((item) => describeErrors(item));
  }
  if (error instanceof PostValidationError) {
    return error.issues.map((issue) => `${issue.file}: ${issue.field}: ${issue.message}`);
  }
  if (error instanceof Error) {
    return [error.message];
  }
  return [String(error)];
};
