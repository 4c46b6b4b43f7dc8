import { expect, test } from "vitest"
import { DenseIndex, similarityFromMeasure } from "@/search/dense"
import { chunkToMetadata, type VectorMatch } from "@/vectorstore"
import { ScriptedStore, makeChunk, wordEmbedder } from "../fixtures"

const PRESSURE = "The pump pressure must stay between two and four bar at all times."
const FILTER = "Cleaning the filter every month keeps the pump running quietly and well."
const SEAL = "Replace the shaft seal whenever water drips from the housing of the pump."

function similarityMatch(text: string, value: number, id = text.slice(0, 8)): VectorMatch {
  return {
    id,
    measure: { kind: "similarity", value },
    metadata: chunkToMetadata(makeChunk({ text, id, source: "pump-guide" })),
  }
}

test("similarityFromMeasure maps distances into (0, 1] and passes similarities through", () => {
  expect(similarityFromMeasure({ kind: "distance", value: 0 })).toBe(1)
  expect(similarityFromMeasure({ kind: "distance", value: 1 })).toBe(0.5)
  expect(similarityFromMeasure({ kind: "distance", value: -3 })).toBe(1)
  expect(similarityFromMeasure({ kind: "similarity", value: 0.42 })).toBe(0.42)
})

test("query oversamples the store and drops short or malformed matches", async () => {
  const store = new ScriptedStore([
    similarityMatch("Too short to keep.", 0.99, "short"),
    similarityMatch(PRESSURE, 0.5, "pressure"),
    { id: "broken", measure: { kind: "similarity", value: 0.9 }, metadata: { text: FILTER } },
    similarityMatch(FILTER, 0.8, "filter"),
  ])
  const embedder = wordEmbedder()
  const dense = new DenseIndex({ embedder, store })

  const hits = await dense.query("pump pressure", 2)

  expect(store.topKs).toEqual([6])
  expect(embedder.calls).toEqual(["pump pressure"])
  expect(hits.map((hit) => hit.chunk.id)).toEqual(["filter", "pressure"])
  expect(hits.map((hit) => hit.score)).toEqual([0.8, 0.5])
  expect(hits.map((hit) => hit.rank)).toEqual([1, 2])
  expect(hits.every((hit) => hit.origin === "vector")).toBe(true)
})

test("distance matches are converted before sorting", async () => {
  const store = new ScriptedStore([
    { ...similarityMatch(PRESSURE, 0, "far"), measure: { kind: "distance", value: 1 } },
    { ...similarityMatch(FILTER, 0, "near"), measure: { kind: "distance", value: 0 } },
  ])
  const dense = new DenseIndex({ embedder: wordEmbedder(), store })

  const hits = await dense.query("pump", 5)

  expect(hits.map((hit) => [hit.chunk.id, hit.score])).toEqual([
    ["near", 1],
    ["far", 0.5],
  ])
})

test("equal scores keep the store order", async () => {
  const store = new ScriptedStore([
    similarityMatch(SEAL, 0.7, "first"),
    similarityMatch(FILTER, 0.7, "second"),
  ])
  const dense = new DenseIndex({ embedder: wordEmbedder(), store })

  const hits = await dense.query("pump", 5)

  expect(hits.map((hit) => hit.chunk.id)).toEqual(["first", "second"])
})

test("the oversample factor is configurable", async () => {
  const store = new ScriptedStore()
  const dense = new DenseIndex({ embedder: wordEmbedder(), store, oversample: 5 })

  await expect(dense.query("pump", 2)).resolves.toEqual([])
  expect(store.topKs).toEqual([10])
})

test("k of zero returns nothing without embedding", async () => {
  const embedder = wordEmbedder()
  const dense = new DenseIndex({ embedder, store: new ScriptedStore() })

  await expect(dense.query("pump", 0)).resolves.toEqual([])
  expect(embedder.calls).toEqual([])
})
