export type StructuredMethod = "direct" | "block" | "repaired"

export type StructuredOutput = {
  value: Record<string, unknown>
  method: StructuredMethod
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function parseRecord(text: string): Record<string, unknown> | undefined {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch {
    return undefined
  }
  return isRecord(value) ? value : undefined
}

/**
 * Returns the `{...}` block opening at `start`, tracking nesting and skipping
 * braces inside single- or double-quoted strings. Undefined when the block
 * never closes.
 */
export function balancedBlock(text: string, start: number) {
  let depth = 0
  let quote: string | undefined
  let escaped = false
  for (let index = start; index < text.length; index++) {
    const char = text[index]
    if (quote) {
      if (escaped) escaped = false
      else if (char === "\\") escaped = true
      else if (char === quote) quote = undefined
      continue
    }
    if (char === '"' || char === "'") {
      quote = char
    } else if (char === "{") {
      depth += 1
    } else if (char === "}") {
      depth -= 1
      if (depth === 0) {
        return text.slice(start, index + 1)
      }
    }
  }
  return undefined
}

/**
 * Rewrites single-quoted strings as JSON strings and drops trailing commas
 * before `}` or `]`. Double-quoted strings are copied untouched.
 */
export function repairQuotes(block: string) {
  let out = ""
  let quote: string | undefined
  for (let index = 0; index < block.length; index++) {
    const char = block[index] ?? ""
    const next = block[index + 1]

    if (quote === '"') {
      out += char
      if (char === "\\" && next !== undefined) {
        out += next
        index += 1
      } else if (char === '"') {
        quote = undefined
      }
      continue
    }

    if (quote === "'") {
      if (char === "\\" && next === "'") {
        out += "'"
        index += 1
      } else if (char === "\\" && next !== undefined) {
        out += char + next
        index += 1
      } else if (char === '"') {
        out += '\\"'
      } else if (char === "'") {
        out += '"'
        quote = undefined
      } else {
        out += char
      }
      continue
    }

    if (char === '"' || char === "'") {
      quote = char
      out += '"'
      continue
    }
    if (char === ",") {
      const rest = block.slice(index + 1).trimStart()
      if (rest.startsWith("}") || rest.startsWith("]")) continue
    }
    out += char
  }
  return out
}

/**
 * Recovers the structured object from a model reply: the whole reply as
 * JSON, else the first balanced block that parses, else that block after
 * quote repair.
 */
export function extractStructured(raw: string): StructuredOutput | undefined {
  const direct = parseRecord(raw.trim())
  if (direct) {
    return { value: direct, method: "direct" }
  }

  let start = raw.indexOf("{")
  while (start !== -1) {
    const block = balancedBlock(raw, start)
    if (!block) {
      start = raw.indexOf("{", start + 1)
      continue
    }
    const parsed = parseRecord(block)
    if (parsed) {
      return { value: parsed, method: "block" }
    }
    const repaired = parseRecord(repairQuotes(block))
    if (repaired) {
      return { value: repaired, method: "repaired" }
    }
    start = raw.indexOf("{", start + block.length)
  }
  return undefined
}
