import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { once } from "node:events";
import { tmpdir } from "node:os";
import path from "node:path";
import { buffer } from "node:stream/consumers";
import { DeviceAddress } from "./address";
import {
  AssetNotFoundError,
  InvalidVectorInputError,
  StoreUnavailableError,
} from "./errors";
import { ImageStore } from "./image-store";
import {
  RenderError,
  ResvgRasterizer,
  type Rasterizer,
  type RenderedRaster,
} from "./rasterizer";
import type { DisplayGeometry } from "./types";

const DISPLAY = { width: 128, height: 296 };
const FAKE_PNG = Buffer.from("fake-png-bytes");

type FakeMode = "ok" | "invalid-input" | "internal" | "wrong-size";

class FakeRasterizer implements Rasterizer {
  documents: string[] = [];

  constructor(private mode: FakeMode = "ok") {}

  rasterize(document: string, size: DisplayGeometry): RenderedRaster {
    this.documents.push(document);
    if (this.mode === "invalid-input" || this.mode === "internal") {
      throw new RenderError(this.mode, "test failure");
    }
    const width = this.mode === "wrong-size" ? size.width + 1 : size.width;
    return {
      width,
      height: size.height,
      pixels: new Uint8Array(width * size.height * 4),
      encodePng: () => FAKE_PNG,
    };
  }
}

function pngSize(png: Buffer): { width: number; height: number } {
  // 8-byte signature, then the IHDR chunk: length, type, width, height
  return { width: png.readUInt32BE(16), height: png.readUInt32BE(20) };
}

describe("ImageStore", () => {
  let dir: string;
  const mac = DeviceAddress.parse("0011223344556677");

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "epd-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createStore(rasterizer: Rasterizer = new FakeRasterizer()): ImageStore {
    return new ImageStore({ imageDir: dir, display: DISPLAY }, rasterizer);
  }

  describe("assetPath", () => {
    it("uses the lowercase address as stem", () => {
      const store = createStore();
      const address = DeviceAddress.parse("AABBCCDDEEFFAABB");
      expect(store.assetPath(address, "VectorSource")).toBe(path.join(dir, "aabbccddeeffaabb.svg"));
      expect(store.assetPath(address, "RasterImage")).toBe(path.join(dir, "aabbccddeeffaabb.bmp"));
      expect(store.assetPath(address, "PreviewImage")).toBe(path.join(dir, "aabbccddeeffaabb.png"));
    });
  });

  describe("settings", () => {
    it("is frozen", () => {
      const store = createStore();
      expect(Object.isFrozen(store.settings)).toBe(true);
      expect(Object.isFrozen(store.settings.display)).toBe(true);
    });
  });

  describe("listDevices", () => {
    it("lists addresses that have a preview image", async () => {
      await writeFile(path.join(dir, "0011223344556677.png"), "");
      await writeFile(path.join(dir, "aabbccddeeffaabb.png"), "");

      const sorted = await createStore().listDevicesSorted();
      expect(sorted.map((a) => a.format())).toEqual(["0011223344556677", "AABBCCDDEEFFAABB"]);
    });

    it("skips other extensions, bad stems and directories", async () => {
      await writeFile(path.join(dir, "0011223344556677.svg"), "");
      await writeFile(path.join(dir, "0011223344556677.bmp"), "");
      await writeFile(path.join(dir, "not-a-mac.png"), "");
      await writeFile(path.join(dir, "00112233445566.png"), "");
      await writeFile(path.join(dir, "readme.txt"), "");
      await mkdir(path.join(dir, "aabbccddeeffaabb.png"));
      await writeFile(path.join(dir, "1122334455667788.png"), "");

      const addresses = await createStore().listDevices();
      expect(addresses.map((a) => a.format())).toEqual(["1122334455667788"]);
    });

    it("lists a device once when its preview exists in both cases", async () => {
      await writeFile(path.join(dir, "aabbccddeeffaabb.png"), "");
      await writeFile(path.join(dir, "AABBCCDDEEFFAABB.png"), "");

      const addresses = await createStore().listDevices();
      expect(addresses.map((a) => a.format())).toEqual(["AABBCCDDEEFFAABB"]);
    });

    it("returns an empty list for an empty directory", async () => {
      expect(await createStore().listDevices()).toEqual([]);
    });

    it("fails with StoreUnavailable when the directory is missing", async () => {
      const store = new ImageStore(
        { imageDir: path.join(dir, "missing"), display: DISPLAY },
        new FakeRasterizer(),
      );
      await expect(store.listDevices()).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it("does not leak the directory path in the error message", async () => {
      const missing = path.join(dir, "missing");
      const store = new ImageStore({ imageDir: missing, display: DISPLAY }, new FakeRasterizer());
      await expect(store.listDevices()).rejects.toThrow("Could not open the image directory");
    });
  });

  describe("readAsset", () => {
    it("streams the file contents", async () => {
      await writeFile(path.join(dir, "0011223344556677.svg"), "<svg/>");

      const asset = await createStore().readAsset(mac, "VectorSource");
      expect(asset.contentType).toBe("image/svg+xml");
      expect(asset.size).toBe(6);
      expect((await buffer(asset.stream)).toString("utf-8")).toBe("<svg/>");
    });

    it("fails with AssetNotFound when the file is absent", async () => {
      const store = createStore();
      await expect(store.readAsset(mac, "PreviewImage")).rejects.toBeInstanceOf(AssetNotFoundError);
      expect((await store.listDevices()).map((a) => a.format())).not.toContain("0011223344556677");
    });

    it("fails with AssetNotFound when the path is a directory", async () => {
      await mkdir(path.join(dir, "0011223344556677.png"));

      await expect(createStore().readAsset(mac, "PreviewImage")).rejects.toThrow(
        AssetNotFoundError,
      );
    });

    it("names the device, not the path, in the error", async () => {
      await expect(createStore().readAsset(mac, "PreviewImage")).rejects.toThrow(
        "No png image for MAC 0011223344556677",
      );
    });

    it("releases the file handle when the stream is abandoned", async () => {
      await writeFile(path.join(dir, "0011223344556677.png"), Buffer.alloc(256 * 1024));

      const asset = await createStore().readAsset(mac, "PreviewImage");
      const closed = once(asset.stream, "close");
      asset.stream.destroy();
      await closed;

      expect(asset.stream.destroyed).toBe(true);
    });
  });

  describe("deleteDevice", () => {
    it("succeeds when only the preview exists", async () => {
      await writeFile(path.join(dir, "0011223344556677.png"), "");

      await createStore().deleteDevice(mac);
      expect(await readdir(dir)).toEqual([]);
    });

    it("removes all three kinds", async () => {
      for (const ext of ["svg", "bmp", "png"]) {
        await writeFile(path.join(dir, `0011223344556677.${ext}`), "");
      }
      await writeFile(path.join(dir, "aabbccddeeffaabb.png"), "");

      await createStore().deleteDevice(mac);
      expect(await readdir(dir)).toEqual(["aabbccddeeffaabb.png"]);
    });

    it("fails with AssetNotFound for a device with no files", async () => {
      await expect(createStore().deleteDevice(mac)).rejects.toBeInstanceOf(AssetNotFoundError);
    });

    it("succeeds once, then fails on the second call", async () => {
      await writeFile(path.join(dir, "0011223344556677.png"), "");
      const store = createStore();

      await expect(store.deleteDevice(mac)).resolves.toBeUndefined();
      await expect(store.deleteDevice(mac)).rejects.toThrow(
        "Could not find any images for MAC 0011223344556677",
      );
    });
  });

  describe("renderAndStore", () => {
    it("writes the preview and the wrapped document", async () => {
      const rasterizer = new FakeRasterizer();
      await createStore(rasterizer).renderAndStore(mac, '<rect width="10" height="10"/>');

      const expected =
        '<svg xmlns="http://www.w3.org/2000/svg" width="128" height="296" viewBox="0 0 128 296">' +
        '<rect width="10" height="10"/></svg>';
      expect(rasterizer.documents).toEqual([expected]);
      expect(await readFile(path.join(dir, "0011223344556677.svg"), "utf-8")).toBe(expected);
      expect(await readFile(path.join(dir, "0011223344556677.png"))).toEqual(FAKE_PNG);
    });

    it("lists the device afterwards", async () => {
      const store = createStore();
      await store.renderAndStore(mac, "");
      expect((await store.listDevices()).map((a) => a.format())).toEqual(["0011223344556677"]);
    });

    it("overwrites previous files and leaves a legacy bmp alone", async () => {
      await writeFile(path.join(dir, "0011223344556677.svg"), "old svg that is rather long");
      await writeFile(path.join(dir, "0011223344556677.png"), "old png that is rather long");
      await writeFile(path.join(dir, "0011223344556677.bmp"), "legacy");

      await createStore().renderAndStore(mac, "");

      expect(await readFile(path.join(dir, "0011223344556677.png"))).toEqual(FAKE_PNG);
      expect(await readFile(path.join(dir, "0011223344556677.bmp"), "utf-8")).toBe("legacy");
    });

    it("fails with InvalidVectorInput and touches nothing", async () => {
      const store = createStore(new FakeRasterizer("invalid-input"));

      await expect(store.renderAndStore(mac, "<oops")).rejects.toBeInstanceOf(
        InvalidVectorInputError,
      );
      expect(await readdir(dir)).toEqual([]);
    });

    it("maps internal render failures to StoreUnavailable", async () => {
      const store = createStore(new FakeRasterizer("internal"));

      await expect(store.renderAndStore(mac, "")).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(await readdir(dir)).toEqual([]);
    });

    it("rejects a raster of the wrong size", async () => {
      const store = createStore(new FakeRasterizer("wrong-size"));

      await expect(store.renderAndStore(mac, "")).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(await readdir(dir)).toEqual([]);
    });

    it("keeps the preview when the vector write fails", async () => {
      // A directory in place of the .svg makes the second write fail
      await mkdir(path.join(dir, "0011223344556677.svg"));

      await expect(createStore().renderAndStore(mac, "")).rejects.toBeInstanceOf(
        StoreUnavailableError,
      );
      expect(await readFile(path.join(dir, "0011223344556677.png"))).toEqual(FAKE_PNG);
    });

    it("skips the vector write when the preview write fails", async () => {
      await mkdir(path.join(dir, "0011223344556677.png"));

      await expect(createStore().renderAndStore(mac, "")).rejects.toThrow(
        "Could not write png image for MAC 0011223344556677",
      );
      expect((await readdir(dir)).sort()).toEqual(["0011223344556677.png"]);
    });

    it("renders a 128x296 image with resvg", async () => {
      const store = createStore(new ResvgRasterizer({ loadSystemFonts: false }));

      await store.renderAndStore(mac, '<circle cx="125" cy="125" r="75" />');

      const svg = await readFile(path.join(dir, "0011223344556677.svg"), "utf-8");
      expect(svg.startsWith("<svg ")).toBe(true);
      expect(svg).toContain('viewBox="0 0 128 296"');

      const asset = await store.readAsset(mac, "PreviewImage");
      const png = await buffer(asset.stream);
      expect(png.length).toBeGreaterThan(0);
      expect(pngSize(png)).toEqual({ width: 128, height: 296 });
    });

    it("rejects malformed markup with resvg before writing", async () => {
      const store = createStore(new ResvgRasterizer({ loadSystemFonts: false }));

      await expect(store.renderAndStore(mac, '<circle cx="1"')).rejects.toThrow(
        new InvalidVectorInputError("0011223344556677"),
      );
      expect(await readdir(dir)).toEqual([]);
    });
  });
});
