import { describe, it, expect } from "vitest";
import { PasswordProtectedUrlStrategy, cookieHeader } from "../url.js";
import { FakeBlog, STORY_BODY, STORY_URL, UNLOCK_URL } from "../../__tests__/fake-blog.js";

function strategy(blog: FakeBlog): PasswordProtectedUrlStrategy {
  return new PasswordProtectedUrlStrategy({ minChars: 500, timeoutMs: 1000, fetch: blog.fetch });
}

const base = { html: "", subject: "Chapter 4", from: "Ana <ana@example.com>" };

describe("cookieHeader", () => {
  it("keeps name=value pairs and ignores commas in dates", () => {
    expect(
      cookieHeader(
        "wp-postpass_abc=%24P%24hash; expires=Thu, 01-Jan-2026 00:00:00 GMT; path=/, theme=dark; path=/"
      )
    ).toBe("wp-postpass_abc=%24P%24hash; theme=dark");
  });

  it("is undefined without a header", () => {
    expect(cookieHeader(null)).toBeUndefined();
  });
});

describe("PasswordProtectedUrlStrategy", () => {
  it("unlocks the page with the password from the message", async () => {
    const blog = new FakeBlog("lantern42");
    const result = await strategy(blog).attempt({
      ...base,
      text: `Chapter 4 is up! ${STORY_URL}\nPassword: lantern42`,
    });

    expect(result).toEqual({
      ok: true,
      value: { content: STORY_BODY, confidence: 0.8, sourceUrl: STORY_URL, title: "Chapter Four" },
    });

    expect(blog.calls.map((c) => [c.init.method ?? "GET", c.url])).toEqual([
      ["GET", STORY_URL],
      ["POST", UNLOCK_URL],
      ["GET", STORY_URL],
    ]);
    expect(blog.calls[1].init.body).toBe("post_password=lantern42&Submit=Enter");
    expect(new Headers(blog.calls[2].init.headers).get("cookie")).toBe(
      "wp-postpass_abc=%24P%24hash; theme=dark"
    );
  });

  it("reports a rejected password", async () => {
    const result = await strategy(new FakeBlog("lantern42")).attempt({
      ...base,
      text: `New part: ${STORY_URL}`,
      password: "wrong-guess",
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("missing-password");
      expect(result.error.message).toBe("password was rejected by the page");
    }
  });

  it("reports a protected page with no password", async () => {
    const result = await strategy(new FakeBlog("lantern42")).attempt({
      ...base,
      text: `New part: ${STORY_URL}`,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("missing-password");
  });

  it("reports HTTP errors as network failures", async () => {
    const result = await strategy(new FakeBlog("lantern42")).attempt({
      ...base,
      text: "",
      url: "https://fiction.example/missing",
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("network");
      expect(result.error.message).toBe("GET https://fiction.example/missing returned 404");
    }
  });

  it("fails without a link", async () => {
    const result = await strategy(new FakeBlog("lantern42")).attempt({ ...base, text: "No link." });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("parse");
      expect(result.error.message).toBe("no URL found in message");
    }
  });
});
