import { expect, test } from "vitest"
import { buildAnswerPrompt, buildContextBlock, citationLabel } from "@/answer/prompt"
import { makeCandidate, makeChunk, manualChunks } from "../fixtures"

test("context passages carry citation labels and separators", () => {
  const [battery, warranty] = manualChunks().map((chunk) => makeCandidate(chunk, 0.5))
  expect(citationLabel(warranty)).toBe("[manualA#1]")
  expect(buildContextBlock([battery, warranty])).toBe(
    "[manualA#0] The battery lasts 10 hours.\n\n---\n\n[manualA#1] Warranty covers 1 year.",
  )
})

test("context is limited in passages and characters", () => {
  const many = Array.from({ length: 12 }, (_, index) =>
    makeCandidate(makeChunk({ text: `passage ${index}`, chunk_index: index }), 0.5),
  )
  expect(buildContextBlock(many).split("\n\n---\n\n")).toHaveLength(10)

  const long = makeCandidate(makeChunk({ text: "x".repeat(1500) }), 0.5)
  expect(buildContextBlock([long])).toBe(`[doc#0] ${"x".repeat(1000)}`)
})

test("the prompt embeds the question verbatim with the passage count", () => {
  const candidates = manualChunks().map((chunk) => makeCandidate(chunk, 0.5))
  const prompt = buildAnswerPrompt("  What does $& cost?  ", candidates)

  expect(prompt).toContain("QUESTION:\nWhat does $& cost?\n")
  expect(prompt).toContain("CONTEXT (2 passages):\n[manualA#0] The battery lasts 10 hours.")
})

test("the prompt describes passages by their citation labels", () => {
  const prompt = buildAnswerPrompt("How long?", manualChunks().map((chunk) => makeCandidate(chunk, 0.5)))

  expect(prompt.split("\n")[0]).toBe(
    "Answer the question using only the context passages below. Each passage is labelled [source#chunk_index].",
  )
})
