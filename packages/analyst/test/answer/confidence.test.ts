import { expect, test } from "vitest"
import { clampConfidence, heuristicConfidence } from "@/answer/confidence"
import { makeCandidate, makeChunk } from "../fixtures"

function candidates(scores: Array<number | null>) {
  return scores.map((score, index) => makeCandidate(makeChunk({ text: `chunk ${index}`, chunk_index: index }), score))
}

test("clampConfidence bounds and rounds", () => {
  expect(clampConfidence(Number.NaN)).toBe(0)
  expect(clampConfidence(Number.POSITIVE_INFINITY)).toBe(0)
  expect(clampConfidence(2)).toBe(1)
  expect(clampConfidence(0.6666)).toBe(0.667)
})

test("scored candidates weigh mean relevance and volume", () => {
  expect(heuristicConfidence(candidates([1, 1]))).toBe(0.91)
  expect(heuristicConfidence(candidates([0.4, null]))).toBe(0.4)
  expect(heuristicConfidence(candidates(Array.from({ length: 10 }, () => 1)))).toBe(1)
})

test("unscored candidates count volume only", () => {
  expect(heuristicConfidence(candidates([null]))).toBe(0.3)
  expect(heuristicConfidence(candidates(Array.from({ length: 20 }, () => null)))).toBe(0.85)
  expect(heuristicConfidence([])).toBe(0)
})
