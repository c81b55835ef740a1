import { readdir, readFile, stat } from "node:fs/promises";
import { join, relative } from "node:path";
import type { ImageRecipe } from "./image/recipe.ts";
import type { BuildContext, ContextFile } from "./types.ts";

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

async function walk(root: string, dir: string, files: ContextFile[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(root, path, files);
    } else if (entry.isFile()) {
      const info = await stat(path);
      files.push({ path: relative(root, path).split("\\").join("/"), executable: (info.mode & 0o111) !== 0 });
    }
  }
}

/** Files under a context directory, relative to it. `null` when the directory does not exist. */
export async function listContextFiles(root: string): Promise<ContextFile[] | null> {
  try {
    const info = await stat(root);
    if (!info.isDirectory()) return null;
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
  const files: ContextFile[] = [];
  await walk(root, root, files);
  return files;
}

/** Read the inputs the recipe copies into the image from the build context. */
export async function loadBuildContext(contextDir: string, recipe: ImageRecipe): Promise<BuildContext> {
  const [manifest, scripts, app] = await Promise.all([
    readOptional(join(contextDir, recipe.manifest.source)),
    listContextFiles(join(contextDir, recipe.scripts.source)),
    listContextFiles(join(contextDir, recipe.app.source)),
  ]);
  return { manifest, scripts, app };
}
