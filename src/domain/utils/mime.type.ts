/**
 * MIME type and extension helpers shared by validation and embedding.
 */

import { extname } from "path";
import { lookup } from "mime-types";

export const DEFAULT_MIME_TYPE = "application/octet-stream";

/**
 * Lower-cases an extension and makes sure it carries a leading dot.
 * @param ext - Extension with or without the dot (e.g. "EXE", ".exe")
 * @returns The normalized extension, or "" for blank input
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  if (!trimmed) {
    return "";
  }
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function fileExtension(filePath: string): string {
  return normalizeExtension(extname(filePath));
}

/**
 * Resolves the MIME type of a file: declared type first, then the extension,
 * then the generic octet-stream type.
 */
export function resolveMimeType(filePath: string, declared?: string | null): string {
  const declaredType = declared?.trim();
  if (declaredType) {
    return declaredType.toLowerCase();
  }

  const inferred = lookup(filePath);
  return inferred ? inferred.toLowerCase() : DEFAULT_MIME_TYPE;
}

/**
 * Checks a MIME type against an allow-set that may contain exact types,
 * type wildcards ("text/*") and the universal wildcard.
 */
export function isMimeTypeAllowed(contentType: string, allowed: ReadonlySet<string>): boolean {
  const normalized = contentType.trim().toLowerCase();

  if (allowed.has(normalized)) {
    return true;
  }

  const mainType = normalized.split("/")[0];
  if (allowed.has(`${mainType}/*`)) {
    return true;
  }

  return allowed.has("*/*");
}

/**
 * Parses a comma-separated MIME type list ("text/*,application/pdf").
 */
export function parseMimeTypeList(value: string): Set<string> {
  const types = new Set<string>();
  for (const item of value.split(",")) {
    const mimeType = item.trim().toLowerCase();
    if (mimeType) {
      types.add(mimeType);
    }
  }
  return types;
}

/**
 * Parses a comma-separated extension list (".exe,bat") into normalized extensions.
 */
export function parseExtensionList(value: string): Set<string> {
  const extensions = new Set<string>();
  for (const item of value.split(",")) {
    const ext = normalizeExtension(item);
    if (ext) {
      extensions.add(ext);
    }
  }
  return extensions;
}
