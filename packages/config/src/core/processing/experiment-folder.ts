import fs from "node:fs"
import path from "node:path"

function runIndex(entry: string): number | undefined {
  const suffix = entry.slice(entry.lastIndexOf("_") + 1)

  return /^\d+$/.test(suffix) ? Number(suffix) : undefined
}

/**
 * Creates the sibling run folder `<dirname>/<basename>_<n>`, with `n` one
 * past the highest index among entries of `<dirname>` starting with
 * `<basename>` (0 when there are none), and returns it relative the way
 * `experimentPath` was written.
 */
export function createExperimentFolder(experimentPath: string, cwd: string): string {
  const folder = path.dirname(experimentPath)
  const experiment = path.basename(experimentPath)
  const absoluteFolder = path.resolve(cwd, folder)

  fs.mkdirSync(absoluteFolder, { recursive: true })

  const indices = fs.readdirSync(absoluteFolder).flatMap((entry) => {
    const index = entry.startsWith(experiment) ? runIndex(entry) : undefined
    return index === undefined ? [] : [index]
  })

  const created = path.join(folder, `${experiment}_${Math.max(-1, ...indices) + 1}`)
  fs.mkdirSync(path.resolve(cwd, created), { recursive: true })

  return created
}
