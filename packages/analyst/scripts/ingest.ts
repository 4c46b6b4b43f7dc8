import { promises as fs } from "node:fs"
import path from "node:path"
import { requestJSON } from "./client"

const TEXT_EXTENSIONS = new Set([".txt", ".md"])

function usage() {
  console.log("Usage: tsx scripts/ingest.ts [--clear] <file.txt|file.md|dir>...")
}

async function collectFiles(target: string): Promise<string[]> {
  const stat = await fs.stat(target)
  if (stat.isFile()) {
    return TEXT_EXTENSIONS.has(path.extname(target).toLowerCase()) ? [target] : []
  }
  const entries = await fs.readdir(target)
  const nested = await Promise.all(entries.sort().map((entry) => collectFiles(path.join(target, entry))))
  return nested.flat()
}

async function main() {
  const args = process.argv.slice(2)
  const clear = args.includes("--clear")
  const targets = args.filter((arg) => arg !== "--clear")
  if (targets.length === 0 && !clear) {
    usage()
    process.exit(1)
  }

  if (clear) {
    await requestJSON("DELETE", "/api/documents")
    console.log("Cleared corpus")
  }

  const files = (await Promise.all(targets.map((target) => collectFiles(path.resolve(target))))).flat()
  let failed = 0
  for (const file of files) {
    const text = await fs.readFile(file, "utf8")
    try {
      const result = await requestJSON("POST", "/api/documents", { source: path.basename(file), text })
      console.log(`ingested ${file}: ${JSON.stringify(result)}`)
    } catch (error) {
      failed += 1
      console.error(`failed ${file}: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  console.log(`Done: ${files.length - failed}/${files.length} files ingested`)
  if (failed > 0) process.exitCode = 1
}

main().catch((error) => {
  console.error(error)
  process.exit(1)
})
