/**
 * Wishlist file writer
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import * as logger from "@/logger";

/**
 * Write the rendered wishlist, creating parent directories as needed
 *
 * @returns Absolute path written
 */
export async function writeWishlistFile(
  outputPath: string,
  contents: string,
): Promise<string> {
  const absolutePath = resolve(outputPath);
  await mkdir(dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, contents, "utf-8");

  logger.info("Wishlist written", {
    path: absolutePath,
    bytes: Buffer.byteLength(contents, "utf-8"),
  });
  return absolutePath;
}
