import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as iconRenderer from "@/core/icon-renderer";
import { generateIconSet } from "@/core/icon-set";
import { IconRenderError, IconWriteError, InvalidIconSizeError } from "@/shared/errors";

vi.mock("@/core/icon-renderer", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/core/icon-renderer")>();
  return {
    ...actual,
    renderIcon: vi.fn(actual.renderIcon)
  };
});

const actualRenderer = await vi.importActual<typeof import("@/core/icon-renderer")>("@/core/icon-renderer");

describe("generateIconSet", () => {
  let workDir = "";

  beforeEach(async () => {
    vi.mocked(iconRenderer.renderIcon).mockClear();
    workDir = await mkdtemp(join(tmpdir(), "icon-set-"));
  });

  afterEach(async () => {
    vi.mocked(iconRenderer.renderIcon).mockImplementation(actualRenderer.renderIcon);
    await rm(workDir, { recursive: true, force: true });
  });

  it("writes the seven standard icons with matching dimensions", async () => {
    const outDir = join(workDir, "Assets.xcassets", "AppIcon.appiconset");
    const log = vi.fn();

    const generated = await generateIconSet(outDir, { log });

    const expectedNames = [16, 32, 64, 128, 256, 512, 1024].map((size) => `icon_${size}x${size}.png`);
    expect(generated.map((icon) => icon.fileName)).toEqual(expectedNames);
    expect((await readdir(outDir)).sort()).toEqual([...expectedNames].sort());

    for (const icon of generated) {
      const metadata = await sharp(icon.filePath).metadata();
      expect(metadata.format).toBe("png");
      expect(metadata.width).toBe(icon.size);
      expect(metadata.height).toBe(icon.size);
      expect(metadata.hasAlpha).toBe(true);
    }

    expect(log).toHaveBeenCalledTimes(8);
    expect(log).toHaveBeenNthCalledWith(1, "✓ Created icon_16x16.png");
    expect(log).toHaveBeenLastCalledWith(`✅ All 7 icons created in ${outDir}`);
  });

  it("writes the asset catalog manifest on request", async () => {
    const log = vi.fn();
    await generateIconSet(workDir, { sizes: [16, 32], writeContents: true, log });

    const contents: unknown = JSON.parse(await readFile(join(workDir, "Contents.json"), "utf8"));
    expect(contents).toMatchObject({
      images: [
        { idiom: "mac", size: "16x16", scale: "1x", filename: "icon_16x16.png" },
        { idiom: "mac", size: "16x16", scale: "2x", filename: "icon_32x32.png" }
      ],
      info: { author: "xcode", version: 1 }
    });
    expect(log).toHaveBeenCalledWith("✓ Created Contents.json");
  });

  it("does not write a manifest by default", async () => {
    await generateIconSet(workDir, { sizes: [16], log: () => undefined });
    expect(await readdir(workDir)).toEqual(["icon_16x16.png"]);
  });

  it("rejects invalid and duplicate sizes before writing anything", async () => {
    const log = vi.fn();
    await expect(generateIconSet(workDir, { sizes: [16, 0], log })).rejects.toBeInstanceOf(InvalidIconSizeError);
    await expect(generateIconSet(workDir, { sizes: [32, 32], log })).rejects.toThrow(
      "Invalid icon size 32: listed more than once"
    );
    expect(await readdir(workDir)).toEqual([]);
    expect(log).not.toHaveBeenCalled();
  });

  it("surfaces directory failures as write errors", async () => {
    const blocker = join(workDir, "blocker");
    await writeFile(blocker, "not a directory");
    const outDir = join(blocker, "icons");

    const failure = generateIconSet(outDir, { sizes: [16], log: () => undefined });
    await expect(failure).rejects.toBeInstanceOf(IconWriteError);
    await expect(failure).rejects.toMatchObject({ filePath: outDir });
  });

  it("stops at the first render failure and keeps the files already written", async () => {
    const cause = new Error("out of memory");
    vi.mocked(iconRenderer.renderIcon).mockImplementation(async (size) => {
      if (size === 64) {
        throw cause;
      }
      return actualRenderer.renderIcon(size);
    });
    const log = vi.fn();

    const failure = generateIconSet(workDir, { sizes: [16, 32, 64, 128], log });

    await expect(failure).rejects.toBeInstanceOf(IconRenderError);
    await expect(failure).rejects.toMatchObject({ size: 64, cause });
    expect((await readdir(workDir)).sort()).toEqual(["icon_16x16.png", "icon_32x32.png"]);
    expect(log).toHaveBeenCalledTimes(2);
    expect(iconRenderer.renderIcon).not.toHaveBeenCalledWith(128);
  });
});
