import { beforeEach, expect, test, vi } from "vitest"

const pinecone = vi.hoisted(() => {
  const upserts: unknown[][] = []
  const queries: Array<Record<string, unknown>> = []
  const listCalls: Array<{ limit?: number; prefix?: string; paginationToken?: string }> = []
  const fetches: string[][] = []
  const deletes: string[][] = []
  const sourceIDs: string[] = []
  return { upserts, queries, listCalls, fetches, deletes, sourceIDs, deleteAll: 0 }
})

vi.mock("@pinecone-database/pinecone", () => {
  class Pinecone {
    index(_indexName: string) {
      return {
        namespace(_namespace: string) {
          return {
            async upsert(records: unknown[]) {
              pinecone.upserts.push(records)
            },
            async query(input: Record<string, unknown>) {
              pinecone.queries.push(input)
              return {
                matches: [
                  { id: "m1", score: 0.9, metadata: { source: "s", text: "first", chunk_index: 0 } },
                  { id: "m2" },
                ],
              }
            },
            async listPaginated(input: { limit?: number; prefix?: string; paginationToken?: string }) {
              pinecone.listCalls.push(input)
              if (input.prefix) {
                return { vectors: pinecone.sourceIDs.filter((id) => id.startsWith(input.prefix ?? "")).map((id) => ({ id })) }
              }
              if (!input.paginationToken) {
                return { vectors: [{ id: "b" }, { id: "a" }], pagination: { next: "page-2" } }
              }
              return { vectors: [{ id: "c" }] }
            },
            async fetch(ids: string[]) {
              pinecone.fetches.push(ids)
              return {
                records: Object.fromEntries(
                  ids.map((id) => [id, { id, values: [], metadata: { source: "s", chunk_index: 0, text: `text ${id}` } }]),
                ),
              }
            },
            async deleteMany(ids: string[]) {
              pinecone.deletes.push(ids)
            },
            async deleteAll() {
              pinecone.deleteAll += 1
            },
          }
        },
      }
    }
  }

  return { Pinecone }
})

import { PineconeVectorStore } from "@/vectorstore/pinecone"

function createStore() {
  return new PineconeVectorStore({ apiKey: "test-secret", indexName: "test-index", namespace: "documents" })
}

beforeEach(() => {
  pinecone.upserts.length = 0
  pinecone.queries.length = 0
  pinecone.listCalls.length = 0
  pinecone.fetches.length = 0
  pinecone.deletes.length = 0
  pinecone.sourceIDs.length = 0
  pinecone.deleteAll = 0
})

test("upsert splits records into multiple batches when the payload is too large", async () => {
  const largeText = "x".repeat(1_100_000)
  await createStore().upsert([
    { id: "v_1", values: [0.1], metadata: { text: largeText, chunk_index: 0 } },
    { id: "v_2", values: [0.2], metadata: { text: largeText, chunk_index: 1 } },
  ])

  expect(pinecone.upserts.map((batch) => batch.length)).toEqual([1, 1])
})

test("upsert keeps a single batch for small payloads", async () => {
  await createStore().upsert([
    { id: "v_1", values: [0.1], metadata: { text: "one", chunk_index: 0 } },
    { id: "v_2", values: [0.2], metadata: { text: "two", chunk_index: 1 } },
    { id: "v_3", values: [0.3], metadata: { text: "three", chunk_index: 2 } },
  ])

  expect(pinecone.upserts.map((batch) => batch.length)).toEqual([3])
})

test("upsert throws when a single record exceeds the safe payload size", async () => {
  await expect(createStore().upsert([
    { id: "v_huge", values: [0.1], metadata: { text: "x".repeat(2_100_000), chunk_index: 0 } },
  ])).rejects.toThrow("exceeds safe request size")
  expect(pinecone.upserts).toEqual([])
})

test("upsert of nothing makes no request", async () => {
  await createStore().upsert([])
  expect(pinecone.upserts).toEqual([])
})

test("query returns similarity matches with metadata", async () => {
  const matches = await createStore().query([0.1, 0.2], 4)

  expect(pinecone.queries).toEqual([{ vector: [0.1, 0.2], topK: 4, includeMetadata: true, includeValues: false }])
  expect(matches).toEqual([
    { id: "m1", measure: { kind: "similarity", value: 0.9 }, metadata: { source: "s", text: "first", chunk_index: 0 } },
    { id: "m2", measure: { kind: "similarity", value: 0 }, metadata: {} },
  ])
})

test("scanAll pages through ids and fetches metadata in id order", async () => {
  const metadata = await createStore().scanAll()

  expect(pinecone.listCalls).toEqual([{ limit: 100 }, { limit: 100, paginationToken: "page-2" }])
  expect(pinecone.fetches).toEqual([["a", "b", "c"]])
  expect(metadata.map((item) => item.chunk_id)).toEqual(["a", "b", "c"])
  expect(metadata[0]).toEqual({ chunk_id: "a", source: "s", chunk_index: 0, text: "text a" })
})

test("clear deletes the whole namespace", async () => {
  await createStore().clear()
  expect(pinecone.deleteAll).toBe(1)
})

test("deleteBySource removes the ids listed under the source prefix", async () => {
  pinecone.sourceIDs.push("policy.txt::1", "policy.txt::0", "policy.txt.bak::0", "other.txt::0")

  const removed = await createStore().deleteBySource("policy.txt")

  expect(removed).toBe(2)
  expect(pinecone.listCalls).toEqual([{ limit: 100, prefix: "policy.txt::" }])
  expect(pinecone.deletes).toEqual([["policy.txt::0", "policy.txt::1"]])
})

test("deleteBySource of an unknown source makes no delete request", async () => {
  await expect(createStore().deleteBySource("missing.txt")).resolves.toBe(0)
  expect(pinecone.deletes).toEqual([])
})
