/**
 * Closed set of extraction strategies, resolved once per file from its content type.
 */
export type FileContent =
  | { kind: "text"; path: string; contentType: string }
  | { kind: "image"; path: string; contentType: string }
  | { kind: "pdf"; path: string; contentType: string }
  | { kind: "generic"; path: string; contentType: string };

export function resolveFileContent(path: string, contentType: string): FileContent {
  const normalized = contentType.trim().toLowerCase();

  if (normalized.startsWith("text/")) {
    return { kind: "text", path, contentType: normalized };
  }
  if (normalized.startsWith("image/")) {
    return { kind: "image", path, contentType: normalized };
  }
  if (normalized === "application/pdf") {
    return { kind: "pdf", path, contentType: normalized };
  }
  return { kind: "generic", path, contentType: normalized };
}
