/**
 * Input Reader
 * Reads a whole document from a file or stdin and decodes it as strict UTF-8
 */

import { readFile } from "fs/promises";
import { buffer } from "node:stream/consumers";
import { InputError } from "./render-error";

/**
 * Decode raw bytes, enforcing the size ceiling before any decoding work
 */
export function decodeSource(bytes: Uint8Array, maxBytes: number): string {
  if (bytes.byteLength > maxBytes) {
    throw new InputError(
      "input-too-large",
      `Input is ${bytes.byteLength} bytes, the limit is ${maxBytes}`,
    );
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new InputError("invalid-encoding", `Input is not valid UTF-8 (${details})`);
  }
}

/**
 * Read the document from a path, or from stdin when no path is given
 */
export async function readSource(
  file: string | undefined,
  maxBytes: number,
): Promise<string> {
  const bytes = file === undefined ? await buffer(process.stdin) : await readFile(file);
  return decodeSource(bytes, maxBytes);
}
