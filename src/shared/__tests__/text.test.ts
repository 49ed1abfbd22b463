import { describe, it, expect } from "vitest";
import {
  authorFromSender,
  cleanSubject,
  countWords,
  findFirstUrl,
  findPassword,
  isSceneBreak,
  splitParagraphs,
  splitSentences,
} from "../text.js";
import { escapeHtml, htmlToText } from "../html.js";

describe("countWords", () => {
  it("counts letter and digit runs", () => {
    expect(countWords("Rain fell on the harbor.")).toBe(5);
    expect(countWords("Room 42, floor 7")).toBe(4);
  });

  it("is zero for blank text", () => {
    expect(countWords("")).toBe(0);
    expect(countWords("  * * *  ")).toBe(0);
  });
});

describe("splitParagraphs", () => {
  it("splits on blank lines and trims", () => {
    expect(splitParagraphs("  One.\n\n\n Two\nlines. \n \nThree.")).toEqual([
      "One.",
      "Two\nlines.",
      "Three.",
    ]);
  });
});

describe("isSceneBreak", () => {
  it.each(["* * *", "***", "---", "#", "═══", "~ ~ ~", "— — —"])("accepts %s", (marker) => {
    expect(isSceneBreak(marker)).toBe(true);
  });

  it.each(["The end.", "- item", "* note", "##"])("rejects %s", (text) => {
    expect(isSceneBreak(text)).toBe(false);
  });
});

describe("splitSentences", () => {
  it("keeps closing quotes with their sentence", () => {
    expect(splitSentences("She ran. He stopped! “Why?” she asked.")).toEqual([
      "She ran.",
      "He stopped!",
      "“Why?”",
      "she asked.",
    ]);
  });
});

describe("cleanSubject", () => {
  it("drops reply and forward prefixes", () => {
    expect(cleanSubject("Re: Fwd: Chapter 12")).toBe("Chapter 12");
    expect(cleanSubject("FW: re: The Lighthouse")).toBe("The Lighthouse");
  });
});

describe("authorFromSender", () => {
  it("prefers the display name", () => {
    expect(authorFromSender('"Jane Doe" <jane@example.com>')).toBe("Jane Doe");
    expect(authorFromSender("Ana Lucia <ana@example.com>")).toBe("Ana Lucia");
  });

  it("falls back to the local part", () => {
    expect(authorFromSender("jane@example.com")).toBe("jane");
    expect(authorFromSender("<writer@example.com>")).toBe("writer");
  });

  it("returns null when nothing matches", () => {
    expect(authorFromSender("")).toBeNull();
  });
});

describe("findFirstUrl", () => {
  it("strips trailing punctuation", () => {
    expect(findFirstUrl("Read it at https://example.com/story/12. Thanks")).toBe(
      "https://example.com/story/12"
    );
  });

  it("returns null without a link", () => {
    expect(findFirstUrl("nothing to see")).toBeNull();
  });
});

describe("findPassword", () => {
  it("reads 'the password is' phrasing", () => {
    expect(findPassword("The password is lantern42.")).toBe("lantern42");
  });

  it("reads a value on the line after the label", () => {
    expect(findPassword("Password:\nember-7")).toBe("ember-7");
  });

  it("skips words that only describe the protection", () => {
    expect(findPassword("This post is password protected. Password: glass9")).toBe("glass9");
  });

  it("returns null when no password is mentioned", () => {
    expect(findPassword("no secrets here")).toBeNull();
  });
});

describe("htmlToText", () => {
  it("keeps paragraphs, line breaks and rules", () => {
    expect(htmlToText("<p>One</p><p>Two<br>Three</p><hr><p>Four</p>")).toBe(
      "One\n\nTwo\nThree\n\n* * *\n\nFour"
    );
  });

  it("drops scripts and styles", () => {
    expect(
      htmlToText("<html><head><style>p{}</style></head><body><script>x()</script><p>Kept</p></body></html>")
    ).toBe("Kept");
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jo'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jo&#39;&lt;/a&gt;"
    );
  });
});
