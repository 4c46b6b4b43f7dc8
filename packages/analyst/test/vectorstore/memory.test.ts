import { expect, test } from "vitest"
import {
  InMemoryVectorStore,
  chunkFromMetadata,
  chunkToMetadata,
  cosineSimilarity,
  euclideanDistance,
} from "@/vectorstore"
import { makeChunk } from "../fixtures"

function record(id: string, values: number[]) {
  return { id, values, metadata: chunkToMetadata(makeChunk({ text: `text of ${id}`, id })) }
}

test("cosineSimilarity and euclideanDistance", () => {
  expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
  expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10)
  expect(cosineSimilarity([1, 2], [1])).toBe(0)
  expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
  expect(euclideanDistance([0, 0], [3, 4])).toBe(5)
})

test("cosine store reports similarities, closest first", async () => {
  const store = new InMemoryVectorStore()
  await store.upsert([record("x", [1, 0]), record("y", [0, 1]), record("xy", [1, 1])])

  const matches = await store.query([1, 0], 2)

  expect(matches.map((match) => match.id)).toEqual(["x", "xy"])
  expect(matches[0]?.measure).toEqual({ kind: "similarity", value: 1 })
  expect(matches[0]?.metadata.text).toBe("text of x")
})

test("l2 store reports distances, closest first", async () => {
  const store = new InMemoryVectorStore("l2")
  await store.upsert([record("far", [3, 4]), record("near", [0, 1])])

  const matches = await store.query([0, 0], 5)

  expect(matches.map((match) => [match.id, match.measure])).toEqual([
    ["near", { kind: "distance", value: 1 }],
    ["far", { kind: "distance", value: 5 }],
  ])
})

test("upsert replaces records with the same id and clear empties the store", async () => {
  const store = new InMemoryVectorStore()
  await store.upsert([record("a", [1, 0])])
  const replacement = record("a", [0, 1])
  await store.upsert([{ ...replacement, metadata: { ...replacement.metadata, text: "replaced" } }])

  expect(store.size).toBe(1)
  expect((await store.scanAll()).map((item) => item.text)).toEqual(["replaced"])

  await store.clear()
  expect(store.size).toBe(0)
  await expect(store.query([1, 0], 3)).resolves.toEqual([])
})

test("chunkToMetadata omits an empty summary", () => {
  expect(chunkToMetadata(makeChunk({ text: "body", source: "s", chunk_index: 2 }))).toEqual({
    chunk_id: "s::2",
    source: "s",
    chunk_index: 2,
    text: "body",
    quality: 1,
  })
})

test("chunkFromMetadata coerces numbers and falls back to the record id", () => {
  expect(chunkFromMetadata({ source: "s", chunk_index: "3", text: "body", quality: "0.5" }, "rec-1")).toEqual({
    id: "rec-1",
    source: "s",
    chunk_index: 3,
    text: "body",
    summary: undefined,
    quality: 0.5,
  })
  expect(chunkFromMetadata({ chunk_id: "c", chunk_index: 0, text: "body" })).toBeUndefined()
  expect(chunkFromMetadata({ chunk_id: "c", source: "s", chunk_index: 0, text: "" })).toBeUndefined()
})

test("deleteBySource removes only that document's chunks", async () => {
  const store = new InMemoryVectorStore()
  await store.upsert([
    { id: "a::0", values: [1, 0], metadata: chunkToMetadata(makeChunk({ text: "first of a", source: "a", chunk_index: 0 })) },
    { id: "a::1", values: [0, 1], metadata: chunkToMetadata(makeChunk({ text: "second of a", source: "a", chunk_index: 1 })) },
    { id: "b::0", values: [1, 1], metadata: chunkToMetadata(makeChunk({ text: "only b", source: "b" })) },
  ])

  await expect(store.deleteBySource("a")).resolves.toBe(2)
  await expect(store.deleteBySource("a")).resolves.toBe(0)
  expect((await store.scanAll()).map((item) => item.chunk_id)).toEqual(["b::0"])
})
