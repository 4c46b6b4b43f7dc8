import { z } from "zod"
import { requestJSON } from "./client"

const AskReply = z.object({
  answer: z.string(),
  evidence_used: z.array(z.object({ source: z.string(), excerpt: z.string() })),
  missing_information: z.string(),
  confidence_score: z.number(),
  top_chunks: z.array(z.object({ source: z.string(), chunk_index: z.number() })),
})

function usage() {
  console.log("Usage: tsx scripts/ask.ts [--json] <question...>")
}

async function main() {
  const args = process.argv.slice(2)
  const json = args.includes("--json")
  const question = args.filter((arg) => arg !== "--json").join(" ").trim()
  if (!question) {
    usage()
    process.exit(1)
  }

  const payload = await requestJSON("POST", "/api/ask", { question })
  if (json) {
    console.log(JSON.stringify(payload, null, 2))
    return
  }

  const reply = AskReply.parse(payload)
  console.log(reply.answer)
  console.log("")
  for (const entry of reply.evidence_used) {
    console.log(`- [${entry.source}] ${entry.excerpt.slice(0, 160)}`)
  }
  if (reply.missing_information) {
    console.log(`\nMissing: ${reply.missing_information}`)
  }
  console.log(`\nConfidence: ${reply.confidence_score}`)
  console.log(`Chunks: ${reply.top_chunks.map((chunk) => `${chunk.source}#${chunk.chunk_index}`).join(", ") || "(none)"}`)
}

main().catch((error) => {
  console.error(error)
  process.exit(1)
})
