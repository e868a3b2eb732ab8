import { randomBytes } from "crypto";
import { cp, mkdir, rm, writeFile } from "fs/promises";
import path from "path";
import tempy from "tempy";
import { pack } from "../container";

/** Source tree of a small digest: cover, index and three articles, one of them with a chart. */
export const DIGEST_FIXTURE = path.join(__dirname, "digest");

/**
 * Copies the digest fixture into a fresh temporary directory and adds its images, which are
 * random bytes so that the packed archive does not shrink below the minimum ePub size.
 */
export async function createDigestTree(): Promise<string> {
  const root = tempy.directory();
  await cp(DIGEST_FIXTURE, root, { recursive: true });

  const images = path.join(root, "EPUB", "images");
  await mkdir(images, { recursive: true });
  await writeFile(path.join(images, "cover.jpg"), randomBytes(2048));
  await writeFile(path.join(images, "chart.jpg"), randomBytes(2048));

  return root;
}

/** Packs the digest fixture into a temporary `.epub` file. */
export async function createDigestEpub(
  edit?: (root: string) => Promise<void>,
): Promise<string> {
  const root = await createDigestTree();
  try {
    await edit?.(root);
    const filename = tempy.file({ extension: "epub" });
    await pack(root, filename);
    return filename;
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}
