import slugify from "@sindresorhus/slugify";
import { isAbsolute, join, relative, sep } from "path";
import { z } from "zod";
import { pathOutsideDownloadDir } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Substituted for runs of characters that are unsafe in file names */
export const DEFAULT_REPLACEMENT = "_";

/** Replacements that can never form a separator or a dot-only name */
export const ReplacementSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]$/, "must be a single letter, digit, underscore or hyphen");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PathMapperOptions {
  replacement?: string;
}

// ---------------------------------------------------------------------------
// Sanitization
// ---------------------------------------------------------------------------

function slug(value: string, replacement: string): string {
  return slugify(value, { separator: replacement, decamelize: false });
}

/** Names that `path.join` would drop or resolve upwards. */
function orPlaceholder(name: string, replacement: string): string {
  return /^\.*$/.test(name) ? replacement : name;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Sanitize one path segment. Each dot-delimited part is slugified on its
 * own, so `Intro Clip.MP4` becomes `intro_clip.mp4`. A segment left empty
 * or made only of dots (`..!`, `!!`) becomes the replacement itself.
 */
export function sanitizeSegment(
  segment: string,
  replacement: string = DEFAULT_REPLACEMENT
): string {
  const sanitized = segment
    .split(".")
    .map((part) => slug(part, replacement))
    .join(".");
  return orPlaceholder(sanitized, replacement);
}

/**
 * Sanitize the host (and port) as a single directory name:
 * `cdn.example.com:8080` becomes `cdn_example_com_8080`.
 */
export function sanitizeHost(
  host: string,
  replacement: string = DEFAULT_REPLACEMENT
): string {
  return orPlaceholder(slug(host, replacement), replacement);
}

/**
 * Raw `[host, ...pathSegments]` of an absolute URI.
 * Query string and fragment do not take part in the mapping.
 */
export function uriSegments(absoluteUri: string): [string, ...string[]] {
  const url = new URL(absoluteUri);
  const pathSegments = url.pathname
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(decodeSegment);
  return [url.host, ...pathSegments];
}

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

/**
 * Map an absolute URI to a file path under `downloadDir`.
 *
 * Pure and deterministic. Distinct URIs can collide when they sanitize to
 * the same segments, or when they differ only in query string.
 * Throws a TypeError for input `URL` cannot parse, and a CLIError when the
 * result would not lie strictly inside `downloadDir`.
 */
export function mapToLocalPath(
  downloadDir: string,
  absoluteUri: string,
  options: PathMapperOptions = {}
): string {
  const replacement = options.replacement ?? DEFAULT_REPLACEMENT;
  const [host, ...pathSegments] = uriSegments(absoluteUri);

  const path = join(
    downloadDir,
    sanitizeHost(host, replacement),
    ...pathSegments.map((segment) => sanitizeSegment(segment, replacement))
  );

  const inside = relative(downloadDir, path);
  if (inside === "" || inside === ".." || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
    throw pathOutsideDownloadDir(absoluteUri, downloadDir);
  }
  return path;
}
