import { describe, expect, it } from "vitest";
import { lintMarkdown } from "./lint";

describe("lintMarkdown", () => {
  it("accepts well-formed markdown", () => {
    const body = ["# Title", "", "A [link](https://example.com) and `code`.", "", "```java", "int x;", "```", ""].join("\n");
    expect(lintMarkdown(body)).toEqual([]);
  });

  it("reports a code fence that is never closed at the line it opens", () => {
    const body = ["intro", "```js", "const a = 1;", ""].join("\n");
    expect(lintMarkdown(body)).toEqual([
      { rule: "unclosed-fence", line: 2, message: "code fence opened with ``` is never closed" },
    ]);
  });

  it("only closes a fence with the same marker", () => {
    const body = ["~~~", "code", "```", "more"].join("\n");
    expect(lintMarkdown(body)).toEqual([
      { rule: "unclosed-fence", line: 1, message: "code fence opened with ~~~ is never closed" },
    ]);
  });

  it("closes a fence with a longer run of the same marker", () => {
    expect(lintMarkdown(["````", "x", "`````"].join("\n"))).toEqual([]);
  });

  it("does not check links inside code fences", () => {
    expect(lintMarkdown(["```", "[broken](", "```"].join("\n"))).toEqual([]);
  });

  it("reports a link whose target is never closed", () => {
    expect(lintMarkdown("See [the docs](https://example.com/docs\nnext line")).toEqual([
      { rule: "malformed-link", line: 1, message: "link target is missing a closing parenthesis" },
    ]);
  });

  it("reports a link with an empty target", () => {
    expect(lintMarkdown("text\nclick [here]() now")).toEqual([
      { rule: "malformed-link", line: 2, message: "link has an empty target" },
    ]);
  });

  it("ignores link-like text inside code spans", () => {
    expect(lintMarkdown("Write `[label](` to start a link.")).toEqual([]);
  });
});
