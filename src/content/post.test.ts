import { describe, expect, it } from "vitest";
import { parsePost, rewriteDraft, serializePost, setDraft, summarize } from "./post";

const SOURCE = [
  "+++",
  "date = 2024-03-18T09:30:00+05:30",
  "draft = true # flip when ready",
  'title = "Writing a Custom Kafka Health Indicator in Spring Boot"',
  'tags = ["Kafka", "Spring Boot"]',
  'summary = "Short preview."',
  'slug = "custom-kafka-health-indicator-spring-boot"',
  'description = "Longer SEO text."',
  'keywords = ["kafka health check", "spring boot actuator"]',
  'author = "Dev Notes"',
  "weight = 2",
  "",
  "[cover]",
  'image = "kafka.png"',
  "draft = true",
  "+++",
  "",
  "## Intro",
  "",
  "Body text.",
  "",
].join("\n");

describe("parsePost", () => {
  it("reads every front matter field and the body", () => {
    const post = parsePost(SOURCE, "kafka.md");
    expect(post.file).toBe("kafka.md");
    expect(post.format).toBe("toml");
    expect(post.date.toISOString()).toBe("2024-03-18T04:00:00.000Z");
    expect(post.draft).toBe(true);
    expect(post.title).toBe("Writing a Custom Kafka Health Indicator in Spring Boot");
    expect(post.tags).toEqual(["Kafka", "Spring Boot"]);
    expect(post.summary).toBe("Short preview.");
    expect(post.slug).toBe("custom-kafka-health-indicator-spring-boot");
    expect(post.description).toBe("Longer SEO text.");
    expect(post.keywords).toEqual(["kafka health check", "spring boot actuator"]);
    expect(post.author).toBe("Dev Notes");
    expect(post.params).toEqual({ weight: 2, cover: { image: "kafka.png", draft: true } });
    expect(post.body).toBe("\n## Intro\n\nBody text.\n");
  });

  it("records the line where the body starts", () => {
    expect(parsePost(SOURCE, "kafka.md").bodyLine).toBe(17);
  });
});

describe("serializePost", () => {
  it("round-trips every field value", () => {
    const original = parsePost(SOURCE, "kafka.md");
    const reparsed = parsePost(serializePost(original), "kafka.md");

    expect(reparsed.date.getTime()).toBe(original.date.getTime());
    expect(reparsed.draft).toBe(original.draft);
    expect(reparsed.title).toBe(original.title);
    expect(reparsed.tags).toEqual(original.tags);
    expect(reparsed.summary).toBe(original.summary);
    expect(reparsed.slug).toBe(original.slug);
    expect(reparsed.description).toBe(original.description);
    expect(reparsed.keywords).toEqual(original.keywords);
    expect(reparsed.author).toBe(original.author);
    expect(reparsed.params).toEqual(original.params);
    expect(reparsed.body).toBe(original.body);
  });

  it("is stable once serialized", () => {
    const once = serializePost(parsePost(SOURCE, "kafka.md"));
    expect(serializePost(parsePost(once, "kafka.md"))).toBe(once);
  });
});

describe("setDraft", () => {
  it("returns a copy with the flag changed", () => {
    const post = parsePost(SOURCE, "kafka.md");
    const published = setDraft(post, false);
    expect(published.draft).toBe(false);
    expect(post.draft).toBe(true);
  });
});

describe("rewriteDraft", () => {
  it("edits only the top-level draft line of a TOML source", () => {
    const rewritten = rewriteDraft(SOURCE, "kafka.md", false);
    expect(rewritten).toBe(SOURCE.replace("draft = true # flip when ready", "draft = false # flip when ready"));
    expect(parsePost(rewritten, "kafka.md").params).toEqual({ weight: 2, cover: { image: "kafka.png", draft: true } });
  });

  it("re-serializes when the source has no draft line", () => {
    const source = SOURCE.replace("draft = true # flip when ready\n", "");
    const rewritten = rewriteDraft(source, "kafka.md", true);
    const post = parsePost(rewritten, "kafka.md");
    expect(post.draft).toBe(true);
    expect(post.title).toBe("Writing a Custom Kafka Health Indicator in Spring Boot");
    expect(post.body).toBe("\n## Intro\n\nBody text.\n");
  });

  it("converts YAML front matter to TOML when it has to rewrite", () => {
    const yamlSource = [
      "---",
      "date: 2024-01-05",
      "draft: true",
      "title: YAML post",
      "tags: [notes]",
      "slug: yaml-post",
      "keywords: [notes]",
      "---",
      "Body",
    ].join("\n");
    const rewritten = rewriteDraft(yamlSource, "yaml.md", false);
    expect(rewritten.startsWith("+++\n")).toBe(true);
    expect(parsePost(rewritten, "yaml.md").draft).toBe(false);
  });
});

describe("summarize", () => {
  it("keeps listing fields with the date as an ISO string", () => {
    expect(summarize(parsePost(SOURCE, "kafka.md"))).toEqual({
      slug: "custom-kafka-health-indicator-spring-boot",
      title: "Writing a Custom Kafka Health Indicator in Spring Boot",
      summary: "Short preview.",
      author: "Dev Notes",
      tags: ["Kafka", "Spring Boot"],
      draft: true,
      date: "2024-03-18T04:00:00.000Z",
    });
  });
});
