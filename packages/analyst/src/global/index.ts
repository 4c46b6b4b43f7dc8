import fs from "fs/promises"
import path from "path"
import os from "os"

const app = "analyst"
const home = process.env.ANALYST_HOME || os.homedir()
const data = path.join(home, `.${app}`)

export const Path = {
  home,
  data,
  log: process.env.ANALYST_LOG_DIR || path.join(data, "log"),
}

export async function ensureGlobalDirs() {
  await fs.mkdir(Path.log, { recursive: true })
}

export const Global = {
  Path,
  ensureGlobalDirs,
}
