import { z } from "zod"
import type { Clock } from "../../ports/clock"
import { type OverwritingRegime, overwritingRegimes } from "../../ports/config"
import type { SourceDocument } from "../../ports/source"
import { ArtifactError } from "../errors/errors"

/** Reserved top-level key written by `save()`. */
export const METADATA_KEY = "config_metadata"

export const configMetadataSchema = z.object({
  saved_at: z.string(),
  saved_at_ms: z.number(),
  regime: z.enum(overwritingRegimes),
  variation: z.string().optional(),
})

export type ConfigMetadata = z.infer<typeof configMetadataSchema>

export function buildMetadata(
  clock: Clock,
  regime: OverwritingRegime,
  variation?: string,
): ConfigMetadata {
  return {
    saved_at: clock.now().toISOString(),
    saved_at_ms: clock.nowMs(),
    regime,
    ...(variation !== undefined && { variation }),
  }
}

/**
 * Pulls the metadata key out of the root document(s) of a parsed source.
 * Returns undefined for ordinary sources.
 */
export function extractMetadata(
  documents: readonly SourceDocument[],
  source: string,
): { documents: SourceDocument[]; metadata: ConfigMetadata | undefined } {
  let metadata: ConfigMetadata | undefined

  const stripped = documents.map((doc) => {
    if (doc.tag !== undefined || !(METADATA_KEY in doc.body)) return doc

    const { [METADATA_KEY]: raw, ...body } = doc.body
    const result = configMetadataSchema.safeParse(raw)

    if (!result.success) {
      throw new ArtifactError(
        `Invalid '${METADATA_KEY}' in ${source}:\n${z.prettifyError(result.error)}`,
        { source },
      )
    }
    metadata = result.data

    return { body }
  })

  return { documents: stripped, metadata }
}
