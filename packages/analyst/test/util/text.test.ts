import { expect, test } from "vitest"
import { clipText, collapseWhitespace, firstSentence, roundTo, shorten } from "@/util/text"
import { TimeoutError, withTimeout } from "@/util/timeout"

test("text helpers", () => {
  expect(clipText("abcdef", 3)).toBe("abc")
  expect(clipText("abc", 10)).toBe("abc")
  expect(collapseWhitespace("  a \n\t b  ")).toBe("a b")
  expect(firstSentence("First one.  Second one.")).toBe("First one.")
  expect(firstSentence("No terminal punctuation")).toBe("No terminal punctuation")
  expect(roundTo(0.12345, 3)).toBe(0.123)
})

test("shorten drops whole words to fit the width", () => {
  expect(shorten("short text", 20)).toBe("short text")
  expect(shorten("one two three four", 12)).toBe("one two...")
  expect(shorten("unbreakable", 5)).toBe("...")
})

test("withTimeout resolves fast work and aborts slow work", async () => {
  await expect(withTimeout(async () => "done", 1_000)).resolves.toBe("done")

  let seen: AbortSignal | undefined
  const slow = withTimeout((signal) => {
    seen = signal
    return new Promise<string>(() => {})
  }, 10)

  await expect(slow).rejects.toBeInstanceOf(TimeoutError)
  await expect(slow).rejects.toMatchObject({ timeoutMs: 10 })
  expect(seen?.aborted).toBe(true)
})
