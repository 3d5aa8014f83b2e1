import * as fs from "fs";
import * as path from "path";

import { decodeImage, encodeImage, formatFromPath, readImageFile, writeImageFile } from "./codecs";
import { makeTempDir, pixelAt, pngColorType, solidRaster, writePng } from "./test-helpers";

describe("formatFromPath", () => {
  it("maps extensions to formats", () => {
    expect(formatFromPath("a.png")).toBe("png");
    expect(formatFromPath("a.JPG")).toBe("jpeg");
    expect(formatFromPath("a.jpeg")).toBe("jpeg");
    expect(formatFromPath("/x/y/a.bmp")).toBe("bmp");
    expect(formatFromPath("a.webp")).toBe("webp");
    expect(formatFromPath("a.gif")).toBeUndefined();
  });
});

describe("png", () => {
  it("writes RGB rasters without an alpha channel", async () => {
    const buffer = await encodeImage(solidRaster(3, 2, "RGB", [10, 20, 30]), "png");
    expect(pngColorType(buffer)).toBe(2);

    const decoded = await decodeImage(buffer, "png");
    expect(decoded.mode).toBe("RGB");
    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(2);
    expect(pixelAt(decoded, 2, 1)).toEqual([10, 20, 30]);
  });

  it("keeps transparency when the raster has it", async () => {
    const buffer = await encodeImage(solidRaster(2, 2, "RGBA", [10, 20, 30, 40]), "png");
    expect(pngColorType(buffer)).toBe(6);
    const decoded = await decodeImage(buffer);
    expect(decoded.mode).toBe("RGBA");
    expect(pixelAt(decoded, 0, 0)).toEqual([10, 20, 30, 40]);
  });

  it("decodes greyscale files to RGB", async () => {
    const dir = makeTempDir();
    const file = path.join(dir, "grey.png");
    writePng(file, 4, 4, [90, 90, 90, 255], 0);
    const decoded = await readImageFile(file);
    expect(decoded.mode).toBe("RGB");
    const [r, g, b] = pixelAt(decoded, 1, 1);
    expect(g).toBe(r);
    expect(b).toBe(r);
    expect(Math.abs(r - 90)).toBeLessThanOrEqual(1);
  });
});

describe("jpeg", () => {
  it("round-trips dimensions through a file", async () => {
    const dir = makeTempDir();
    const file = path.join(dir, "photo.jpg");
    await writeImageFile(file, solidRaster(40, 24, "RGB", [128, 128, 128]));

    const decoded = await readImageFile(file);
    expect(decoded.mode).toBe("RGB");
    expect(decoded.width).toBe(40);
    expect(decoded.height).toBe(24);
    const [r] = pixelAt(decoded, 20, 12);
    expect(Math.abs(r - 128)).toBeLessThanOrEqual(3);
  });
});

describe("bmp", () => {
  it("round-trips an RGB raster through a file", async () => {
    const file = path.join(makeTempDir(), "photo.BMP");
    await writeImageFile(file, solidRaster(40, 24, "RGB", [200, 100, 50]));

    const decoded = await readImageFile(file);
    expect(decoded.mode).toBe("RGB");
    expect(decoded.width).toBe(40);
    expect(decoded.height).toBe(24);
    expect(pixelAt(decoded, 39, 23)).toEqual([200, 100, 50]);
  });
});

describe("webp", () => {
  it("round-trips an RGB raster through a file", async () => {
    const file = path.join(makeTempDir(), "photo.webp");
    await writeImageFile(file, solidRaster(40, 24, "RGB", [200, 100, 50]));

    const decoded = await readImageFile(file);
    expect(decoded.mode).toBe("RGB");
    expect(decoded.width).toBe(40);
    expect(decoded.height).toBe(24);
    const [r, g, b] = pixelAt(decoded, 20, 12);
    expect(Math.abs(r - 200)).toBeLessThanOrEqual(4);
    expect(Math.abs(g - 100)).toBeLessThanOrEqual(4);
    expect(Math.abs(b - 50)).toBeLessThanOrEqual(4);
  });

  it("decodes webp bytes without a format hint", async () => {
    const buffer = await encodeImage(solidRaster(8, 6, "RGB", [0, 0, 0]), "webp");
    const decoded = await decodeImage(buffer);
    expect(decoded.width).toBe(8);
    expect(decoded.height).toBe(6);
  });
});

describe("errors", () => {
  it("rejects bytes that are not an image", async () => {
    await expect(decodeImage(Buffer.from("definitely not an image"), "png")).rejects.toThrow();
  });

  it("rejects a missing file", async () => {
    await expect(readImageFile(path.join(makeTempDir(), "missing.png"))).rejects.toThrow();
  });

  it("refuses to write an unknown format", async () => {
    const file = path.join(makeTempDir(), "out.gif");
    await expect(writeImageFile(file, solidRaster(1, 1, "RGB", [0, 0, 0]))).rejects.toThrow(
      "Unsupported output format: .gif"
    );
    expect(fs.existsSync(file)).toBe(false);
  });
});
