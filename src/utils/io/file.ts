/**
 * File System Utilities
 *
 * Small synchronous helpers used by the CLI, the exporter and the logger.
 * The pipeline core never touches the file system.
 */

import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";

/**
 * Ensure a directory exists, creating it and parents if necessary
 *
 * @returns The same path (for chaining)
 */
export const ensureFolder = (path: string) => {
    mkdirSync(path, { recursive: true });
    return path;
};

/** Read a UTF-8 text file, normalizing a leading byte-order mark away. */
export const readTextFile = (path: string) => readFileSync(path, "utf-8").replace(/^\uFEFF/, "");

/** Read and parse a JSON file without assuming its shape. */
export const readJSONFile = (path: string): unknown => JSON.parse(readTextFile(path));

/** Write text, creating the parent folder first. */
export const writeTextFile = (path: string, content: string) => {
    ensureFolder(dirname(path));
    writeFileSync(path, content, "utf-8");
    return path;
};

/** Write pretty-printed JSON (non-ASCII kept as-is). */
export const writeJSONFile = (path: string, data: unknown) =>
    writeTextFile(path, JSON.stringify(data, null, 2));
