import { describe, it, expect, vi, afterEach } from "vitest";
import { PublishError, type FinalContent } from "@draftloom/core";
import { DryRunPublisher } from "../adapters/dry-run.js";
import { isTransientFailure } from "../adapters/http.js";
import { markdownToHtml } from "../adapters/markdown.js";
import { WordPressPublisher } from "../adapters/wordpress.js";

const content: FinalContent = {
  title: "Bounded critique loops",
  content: "## Loop budget\n\nEvery revision counts.",
  metaDescription: "",
  slug: "bounded-critique-loops",
  tags: [],
  category: "",
};

describe("markdownToHtml", () => {
  it("converts headings, paragraphs and lists", () => {
    expect(markdownToHtml("## Title\n\nSome **bold** text.\n\n- one\n- two")).toBe(
      "<h2>Title</h2>\n<p>Some <strong>bold</strong> text.</p>\n<ul><li>one</li><li>two</li></ul>"
    );
  });

  it("escapes raw HTML", () => {
    expect(markdownToHtml("a <script> tag")).toBe("<p>a &lt;script&gt; tag</p>");
  });
});

describe("DryRunPublisher", () => {
  it("requires a publish time for scheduled posts", async () => {
    const publisher = new DryRunPublisher();
    await expect(publisher.publish(content, { visibility: "scheduled" })).rejects.toBeInstanceOf(
      PublishError
    );
  });

  it("echoes the requested visibility", async () => {
    const result = await new DryRunPublisher().publish(content, {
      visibility: "scheduled",
      scheduledAt: "2026-03-01T09:00:00.000Z",
    });
    expect(result).toEqual({
      id: "dry-run-1",
      url: "dry-run://bounded-critique-loops",
      platform: "dry-run",
      visibility: "scheduled",
      publishedAt: "2026-03-01T09:00:00.000Z",
    });
  });
});

describe("isTransientFailure", () => {
  it("classifies status codes and connection errors", () => {
    expect(isTransientFailure({ statusCode: 503 })).toBe(true);
    expect(isTransientFailure({ status: 429 })).toBe(true);
    expect(isTransientFailure({ statusCode: 401 })).toBe(false);
    expect(isTransientFailure(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
    expect(isTransientFailure(new Error("validation failed"))).toBe(false);
  });
});

describe("WordPressPublisher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const config = { url: "https://wp.example.com/", username: "editor", password: "test-secret" };

  it("maps visibility onto WordPress post status", async () => {
    const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
      const body: unknown = JSON.parse(String(init?.body));
      const status = typeof body === "object" && body !== null ? Reflect.get(body, "status") : undefined;
      return new Response(
        JSON.stringify({ id: 7, link: "https://wp.example.com/?p=7", status, date_gmt: "2026-03-01T09:00:00" }),
        { status: 201 }
      );
    });
    vi.stubGlobal("fetch", fetchMock);

    const result = await new WordPressPublisher(config).publish(content, {
      visibility: "scheduled",
      scheduledAt: "2026-03-01T09:00:00Z",
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://wp.example.com/wp-json/wp/v2/posts");
    const sent: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(sent).toMatchObject({ status: "future", slug: "bounded-critique-loops" });
    expect(result).toEqual({
      id: "7",
      url: "https://wp.example.com/?p=7",
      platform: "wordpress",
      visibility: "scheduled",
      publishedAt: "2026-03-01T09:00:00Z",
    });
  });

  it("marks server errors as transient and auth errors as permanent", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("upstream down", { status: 502 })));
    const transient = await new WordPressPublisher(config)
      .publish(content, { visibility: "draft" })
      .catch((err: unknown) => err);
    expect(transient).toBeInstanceOf(PublishError);
    expect(transient instanceof PublishError && transient.transient).toBe(true);

    vi.stubGlobal("fetch", vi.fn(async () => new Response("forbidden", { status: 403 })));
    const permanent = await new WordPressPublisher(config)
      .publish(content, { visibility: "draft" })
      .catch((err: unknown) => err);
    expect(permanent instanceof PublishError && permanent.transient).toBe(false);
  });
});
