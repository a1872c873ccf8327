import { readFile } from "fs/promises";
import { z } from "zod";
import { fileNotFound, fileNotReadable, invalidUri } from "./errors/catalog.js";
import { errorMessage, type CLIError } from "./errors/types.js";

function hasHttpScheme(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    // .url() already reported it
    return true;
  }
}

const HttpUriSchema = z
  .string()
  .url()
  .refine(hasHttpScheme, { message: "only http and https are supported" });

/**
 * Split a URI list into entries. Blank lines and `#` comments are skipped.
 */
export function parseUriList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export interface InvalidUri {
  uri: string;
  error: CLIError;
}

function checkUri(uri: string): CLIError | undefined {
  const result = HttpUriSchema.safeParse(uri);
  if (result.success) return undefined;
  return invalidUri(uri, result.error.issues.map((i) => i.message).join("; "));
}

/**
 * Ensure `uri` is an absolute http(s) URI.
 * @throws CLIError with code VALIDATION_INVALID_URI
 */
export function validateUri(uri: string): string {
  const error = checkUri(uri);
  if (error) throw error;
  return uri;
}

/**
 * Partition URIs into valid ones and the errors for the rest, keeping order.
 */
export function partitionUris(uris: string[]): {
  valid: string[];
  invalid: InvalidUri[];
} {
  const valid: string[] = [];
  const invalid: InvalidUri[] = [];
  for (const uri of uris) {
    const error = checkUri(uri);
    if (error) {
      invalid.push({ uri, error });
    } else {
      valid.push(uri);
    }
  }
  return { valid, invalid };
}

/**
 * Read a URI list file from disk.
 */
export async function readUriFile(path: string): Promise<string[]> {
  try {
    return parseUriList(await readFile(path, "utf-8"));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw fileNotFound(path);
    }
    throw fileNotReadable(path, errorMessage(error));
  }
}
