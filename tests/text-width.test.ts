import { expect, test } from "vitest"

import { stringWidth, truncateToWidth, wcwidth } from "../src/ui/text-width.ts"

test("ascii is one column, CJK and emoji two, combining marks none", () => {
  expect(stringWidth("abc")).toBe(3)
  expect(stringWidth("日本語")).toBe(6)
  expect(stringWidth("한국")).toBe(4)
  expect(stringWidth("😀")).toBe(2)
  expect(stringWidth("é")).toBe(1)
  expect(wcwidth(0x07)).toBe(0)
})

test("truncateToWidth keeps whole characters that fit", () => {
  expect(truncateToWidth("日本語", 5)).toBe("日本")
  expect(truncateToWidth("日本語", 6)).toBe("日本語")
  expect(truncateToWidth("a😀b", 2)).toBe("a")
  expect(truncateToWidth("a😀b", 3)).toBe("a😀")
  expect(truncateToWidth("abc", 0)).toBe("")
})
