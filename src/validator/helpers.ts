import path from "path";

/**
 * Trim decoder stderr and drop the leading echo of the input path
 * ("<path>: message" becomes "message").
 */
export function cleanDiagnostic(stderr: string, filePath: string): string {
  const trimmed = stderr.trim();
  if (filePath === "" || !trimmed.startsWith(filePath)) {
    return trimmed;
  }
  return trimmed
    .slice(filePath.length)
    .replace(/^:\s*/, "")
    .trim();
}

/**
 * Lowercase extension without the dot; "" for files without one
 */
export function getExtension(fileName: string): string {
  return path.extname(fileName).slice(1).toLowerCase();
}

/**
 * Normalize a user-supplied extension list ("CR2, .dng") to a lookup set
 */
export function toExtensionSet(extensions: readonly string[]): Set<string> {
  const set = new Set<string>();
  for (const extension of extensions) {
    const normalized = extension.trim().replace(/^\./, "").toLowerCase();
    if (normalized) {
      set.add(normalized);
    }
  }
  return set;
}
