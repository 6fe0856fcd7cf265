import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { ImmutableValueGraphAdapter, type DeserializeOptions } from "../graph/immutableAdapter.js";
import type { GraphStreamCodecs } from "./graphCodec.js";

/**
 * Persists the serialized adapter at `filePath`, creating parent directories
 * on demand. File-system errors propagate unchanged.
 */
export async function writeGraphFile<N, W>(
  filePath: string,
  adapter: ImmutableValueGraphAdapter<N, W>,
  codecs: GraphStreamCodecs<N, W>,
): Promise<number> {
  const bytes = adapter.serialize(codecs);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, bytes);
  return bytes.length;
}

/** Reads a file written by {@link writeGraphFile} back into an adapter. */
export async function readGraphFile<N, W>(
  filePath: string,
  options: DeserializeOptions<N, W>,
): Promise<ImmutableValueGraphAdapter<N, W>> {
  const bytes = await readFile(filePath);
  return ImmutableValueGraphAdapter.deserialize(bytes, options);
}
