import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { buildAppIconContents } from "@/core/app-icon-contents";
import type { Bitmap } from "@/core/bitmap";
import { assertValidIconSize, renderIcon } from "@/core/icon-renderer";
import { CONTENTS_FILE_NAME, ICON_SIZES, iconFileName } from "@/shared/constants";
import { IconRenderError, IconWriteError, InvalidIconSizeError } from "@/shared/errors";
import { writeIconPng } from "@/shared/png-writer";
import type { GeneratedIcon } from "@/types/raster";

export interface IconSetOptions {
  sizes?: readonly number[];
  writeContents?: boolean;
  log?: (line: string) => void;
}

function validateSizes(sizes: readonly number[]): void {
  const seen = new Set<number>();
  for (const size of sizes) {
    assertValidIconSize(size);
    if (seen.has(size)) {
      throw new InvalidIconSizeError(size, "listed more than once");
    }
    seen.add(size);
  }
}

async function renderOrThrow(size: number): Promise<Bitmap> {
  try {
    return await renderIcon(size);
  } catch (error) {
    throw new IconRenderError(size, error);
  }
}

async function ensureDirectory(outDir: string): Promise<void> {
  try {
    await mkdir(outDir, { recursive: true });
  } catch (error) {
    throw new IconWriteError(outDir, error);
  }
}

async function writeContents(outDir: string, sizes: readonly number[]): Promise<string> {
  const filePath = join(outDir, CONTENTS_FILE_NAME);
  try {
    await writeFile(filePath, `${JSON.stringify(buildAppIconContents(sizes), null, 2)}\n`);
  } catch (error) {
    throw new IconWriteError(filePath, error);
  }
  return filePath;
}

export async function generateIconSet(outDir: string, options: IconSetOptions = {}): Promise<GeneratedIcon[]> {
  const sizes = options.sizes ?? ICON_SIZES;
  const log = options.log ?? console.log;
  validateSizes(sizes);

  await ensureDirectory(outDir);

  const generated: GeneratedIcon[] = [];
  for (const size of sizes) {
    const icon = await renderOrThrow(size);
    const filePath = await writeIconPng(icon, outDir);
    const fileName = iconFileName(size);
    generated.push({ size, fileName, filePath });
    log(`✓ Created ${fileName}`);
  }

  if (options.writeContents) {
    await writeContents(outDir, sizes);
    log(`✓ Created ${CONTENTS_FILE_NAME}`);
  }

  log(`✅ All ${generated.length} icons created in ${outDir}`);
  return generated;
}
