import { describe, expect, it } from "vitest"
import { singleLine, sliceToWidth, stringWidth, titleCase, truncateToWidth } from "../text.js"

describe("text width helpers", () => {
  it("counts wide and combining characters", () => {
    expect(stringWidth("abc")).toBe(3)
    expect(stringWidth("漢字")).toBe(4)
    expect(stringWidth("é")).toBe(1)
    expect(stringWidth("\u001b[31mred\u001b[0m")).toBe(3)
  })

  it("slices without splitting a wide character", () => {
    expect(sliceToWidth("漢字", 3)).toBe("漢")
    expect(sliceToWidth("abc", 0)).toBe("")
  })

  it("truncates with an ellipsis", () => {
    expect(truncateToWidth("hello world", 8, "…")).toBe("hello w…")
    expect(truncateToWidth("hello", 5, "…")).toBe("hello")
    expect(truncateToWidth("hello", 2, "...")).toBe("..")
    expect(truncateToWidth("hello", 0, "…")).toBe("")
  })

  it("keeps labels on one line", () => {
    expect(singleLine("line one\nline two\r\n\tthree")).toBe("line one line two three")
    expect(singleLine("plain")).toBe("plain")
  })

  it("title-cases mode names", () => {
    expect(titleCase("pane")).toBe("Pane")
    expect(titleCase("")).toBe("")
  })
})
