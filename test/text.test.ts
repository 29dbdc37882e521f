import { describe, expect, test } from "vitest";
import {
  EMPTY_OUTPUT_PLACEHOLDER,
  TRUNCATION_MARKER,
  escapeHtml,
  escapeHtmlAttr,
  stripDecorativeLines,
  tailNonEmptyLines,
  truncateTail,
} from "../src/shared/text.js";

describe("stripDecorativeLines", () => {
  test("drops rules, keeps blank and content lines", () => {
    expect(stripDecorativeLines("───")).toBe("");
    expect(stripDecorativeLines("====")).toBe("");
    expect(stripDecorativeLines("ok: done")).toBe("ok: done");
    expect(stripDecorativeLines("a\n───\n\n  ====  \nok: done")).toBe("a\n\nok: done");
  });

  test("keeps whitespace-only lines verbatim", () => {
    expect(stripDecorativeLines("x\n   \ny")).toBe("x\n   \ny");
  });

  test("keeps framed lines that carry text", () => {
    const text = "╭────╮\n│ hello │\n╰────╯\n└──┘\n-_=~ ▪▫";
    expect(stripDecorativeLines(text)).toBe("╭────╮\n│ hello │\n╰────╯");
  });

  test("is idempotent", () => {
    const text = "┌──┐\n│ build ok │\n\n═══\n  - item\n~~~\n> prompt";
    const once = stripDecorativeLines(text);
    expect(once).toBe("│ build ok │\n\n  - item\n> prompt");
    expect(stripDecorativeLines(once)).toBe(once);
  });
});

describe("tailNonEmptyLines", () => {
  test("keeps the last non-empty lines in order", () => {
    expect(tailNonEmptyLines("a\n\nb\nc\n", 2)).toBe("b\nc");
    expect(tailNonEmptyLines("a\n\nb", 5)).toBe("a\nb");
  });

  test("falls back to a placeholder", () => {
    expect(tailNonEmptyLines(null, 5)).toBe(EMPTY_OUTPUT_PLACEHOLDER);
    expect(tailNonEmptyLines("", 5)).toBe(EMPTY_OUTPUT_PLACEHOLDER);
    expect(tailNonEmptyLines("  \n\t\n", 5)).toBe(EMPTY_OUTPUT_PLACEHOLDER);
  });
});

describe("truncateTail", () => {
  test("leaves short text alone", () => {
    expect(truncateTail("abc", 3)).toBe("abc");
  });

  test("keeps the most recent characters behind a marker", () => {
    const out = truncateTail("abcdef", 4);
    expect(out).toBe("[...truncated]\ncdef");
    expect(out.length).toBeLessThanOrEqual(4 + TRUNCATION_MARKER.length);
  });

  test("never splits an emoji at the cut", () => {
    const out = truncateTail("start " + "😀".repeat(10), 5);
    expect(out).toBe(TRUNCATION_MARKER + "😀".repeat(5));
  });

  test("counts an emoji as one character", () => {
    expect(truncateTail("ab😀", 3)).toBe("ab😀");
  });
});

describe("escaping", () => {
  test("escapeHtml covers Telegram's reserved characters", () => {
    expect(escapeHtml("<b>a & b</b>")).toBe("&lt;b&gt;a &amp; b&lt;/b&gt;");
  });

  test("escapeHtmlAttr also escapes quotes", () => {
    expect(escapeHtmlAttr(`"%1" & 'x'`)).toBe("&quot;%1&quot; &amp; &#39;x&#39;");
  });
});
