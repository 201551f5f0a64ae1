function slugify(value: string): string {
  return value
    .replace(/[^a-zA-Z0-9-_]/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-|-$/g, "")
    .toLowerCase()
}

/**
 * Base name (without extension) of an uploaded file name, URL or path
 */
export function extractBaseName(videoUrl: string, fileName?: string): string {
  let name = fileName
  if (!name) {
    try {
      name = new URL(videoUrl).pathname.split("/").pop()
    } catch {
      // Not a URL, treat it as a file path
      name = videoUrl.split(/[\\/]/).pop()
    }
  }

  const base = slugify((name || "").replace(/\.[^/.]+$/, ""))
  return base || "video"
}

/**
 * Workflow ID: <file base>-<target language>-<uuid>
 */
export function buildWorkflowId(baseName: string, targetLanguage: string, uniqueId: string): string {
  return `${baseName}-${slugify(targetLanguage)}-${uniqueId}`
}
