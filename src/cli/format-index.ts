import path from "node:path";

import { formatProjectIndex } from "../core/project-index.js";
import { readTextFile, writeTextFile } from "../core/utils.js";

export type FormatIndexResult = {
  path: string;
  changed: boolean;
  written: boolean;
};

/** With `check`, reports an unformatted index instead of rewriting it. */
export async function formatIndexCommand(
  indexPath: string,
  opts: { check?: boolean } = {},
): Promise<FormatIndexResult> {
  const absolutePath = path.resolve(indexPath);
  const raw = await readTextFile(absolutePath);
  const formatted = formatProjectIndex(raw, absolutePath);

  const changed = formatted !== raw;
  if (!changed) {
    console.log(`${indexPath} is already formatted`);
    return { path: absolutePath, changed, written: false };
  }

  if (opts.check) {
    console.log(`${indexPath} is not formatted`);
    return { path: absolutePath, changed, written: false };
  }

  await writeTextFile(absolutePath, formatted);
  console.log(`Formatted ${indexPath}`);
  return { path: absolutePath, changed, written: true };
}
