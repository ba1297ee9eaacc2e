/**
 * Image Store
 * Device-keyed store of display images on a flat directory, plus the
 * SVG-to-PNG render path that fills it
 *
 * Every call re-touches the filesystem: there is no cache and no per-address
 * locking. Multi-file operations are sequential and best-effort, and are
 * never rolled back.
 */

import { open, readdir, rm, writeFile, type FileHandle } from "fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { DeviceAddress } from "./address";
import {
  AssetNotFoundError,
  InvalidVectorInputError,
  StoreUnavailableError,
} from "./errors";
import { RenderError, type Rasterizer, type RenderedRaster } from "./rasterizer";
import {
  ASSET_FORMATS,
  ASSET_KINDS,
  type AssetKind,
  type AssetStream,
  type StoreSettings,
} from "./types";
import { Logger } from "./utils/logger";
import { wrapSvgDocument } from "./utils/wrap-svg-document";

const PREVIEW_EXTENSION = `.${ASSET_FORMATS.PreviewImage.extension}`;

export class ImageStore {
  readonly settings: StoreSettings;

  constructor(
    settings: StoreSettings,
    private readonly rasterizer: Rasterizer,
    private readonly logger: Logger = new Logger("silent"),
  ) {
    this.settings = Object.freeze({
      imageDir: settings.imageDir,
      display: Object.freeze({ ...settings.display }),
    });
  }

  /**
   * Deterministic location of one asset: <imageDir>/<lowercase hex>.<ext>
   */
  assetPath(address: DeviceAddress, kind: AssetKind): string {
    return path.join(
      this.settings.imageDir,
      `${address.fileStem}.${ASSET_FORMATS[kind].extension}`,
    );
  }

  /**
   * Addresses of every device that has a preview image, in directory order
   *
   * @throws {StoreUnavailableError} If the directory cannot be read
   */
  async listDevices(): Promise<DeviceAddress[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.settings.imageDir, { withFileTypes: true });
    } catch (error) {
      throw new StoreUnavailableError(
        "Could not open the image directory",
        "list-devices",
        undefined,
        { cause: error },
      );
    }

    // Stems parse case-insensitively, so two files can name one device
    const addresses = new Map<string, DeviceAddress>();
    for (const entry of entries) {
      if (!entry.isFile()) continue;

      const ext = path.extname(entry.name);
      if (ext !== PREVIEW_EXTENSION) continue;

      try {
        const address = DeviceAddress.parse(path.basename(entry.name, ext));
        addresses.set(address.format(), address);
      } catch {
        this.logger.debug(`Skipping ${entry.name}: not a device image`);
      }
    }

    return [...addresses.values()];
  }

  /**
   * Same set as listDevices(), ordered byte-wise
   */
  async listDevicesSorted(): Promise<DeviceAddress[]> {
    const addresses = await this.listDevices();
    return addresses.sort(DeviceAddress.compare);
  }

  /**
   * Open one asset as a forward-only stream backed by the file handle.
   * The handle closes when the stream ends, errors or is destroyed.
   *
   * @throws {AssetNotFoundError} If the file cannot be opened for reading
   */
  async readAsset(address: DeviceAddress, kind: AssetKind): Promise<AssetStream> {
    const format = ASSET_FORMATS[kind];

    let handle: FileHandle;
    try {
      handle = await open(this.assetPath(address, kind), "r");
    } catch (error) {
      throw new AssetNotFoundError(
        `No ${format.extension} image for MAC ${address}`,
        "read-asset",
        address.format(),
        { cause: error },
      );
    }

    let size: number;
    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new Error(`${format.extension} path is not a regular file`);
      }
      size = stats.size;
    } catch (error) {
      await handle.close();
      throw new AssetNotFoundError(
        `No ${format.extension} image for MAC ${address}`,
        "read-asset",
        address.format(),
        { cause: error },
      );
    }

    return {
      kind,
      contentType: format.contentType,
      size,
      stream: handle.createReadStream(),
    };
  }

  /**
   * Remove the svg, bmp and png files of a device, one after the other.
   * A missing kind is fine; only a device with no files at all is an error.
   * Not atomic: a crash part-way leaves whatever was not yet removed.
   *
   * @throws {AssetNotFoundError} If none of the three files could be removed
   */
  async deleteDevice(address: DeviceAddress): Promise<void> {
    let removed = 0;

    for (const kind of ASSET_KINDS) {
      try {
        await rm(this.assetPath(address, kind));
        removed++;
      } catch (error) {
        this.logger.debug(
          `No ${ASSET_FORMATS[kind].extension} removed for MAC ${address}: ${describe(error)}`,
        );
      }
    }

    if (removed === 0) {
      throw new AssetNotFoundError(
        `Could not find any images for MAC ${address}`,
        "delete-device",
        address.format(),
      );
    }

    this.logger.info(`Deleted ${removed} image file(s) for MAC ${address}`);
  }

  /**
   * Wrap `body` in an SVG sized to the display, rasterize it, then write the
   * PNG preview followed by the wrapped SVG.
   *
   * Nothing is written unless rasterization succeeds. The two writes are
   * independent overwrites: if the second fails the first stays, and the
   * legacy .bmp is left as it is.
   *
   * @throws {InvalidVectorInputError} If the rasterizer rejects the markup
   * @throws {StoreUnavailableError} On render failure or a failed write
   */
  async renderAndStore(address: DeviceAddress, body: string): Promise<void> {
    const { display } = this.settings;
    const document = wrapSvgDocument(body, display);

    const raster = this.rasterize(address, document);

    let png: Uint8Array;
    try {
      png = raster.encodePng();
    } catch (error) {
      throw new StoreUnavailableError(
        `Could not encode preview for MAC ${address}`,
        "render-and-store",
        address.format(),
        { cause: error },
      );
    }

    await this.write(address, "PreviewImage", png);
    await this.write(address, "VectorSource", document);

    this.logger.info(
      `Stored ${display.width}x${display.height} image for MAC ${address}`,
    );
  }

  private rasterize(address: DeviceAddress, document: string): RenderedRaster {
    const { display } = this.settings;
    try {
      const raster = this.rasterizer.rasterize(document, display);
      if (raster.width !== display.width || raster.height !== display.height) {
        throw new RenderError(
          "internal",
          `Rasterizer returned ${raster.width}x${raster.height}`,
        );
      }
      return raster;
    } catch (error) {
      if (error instanceof RenderError && error.kind === "invalid-input") {
        this.logger.debug(`Rejected SVG for MAC ${address}: ${error.message}`);
        throw new InvalidVectorInputError(address.format(), { cause: error });
      }
      throw new StoreUnavailableError(
        `Could not render image for MAC ${address}`,
        "render-and-store",
        address.format(),
        { cause: error },
      );
    }
  }

  private async write(
    address: DeviceAddress,
    kind: AssetKind,
    data: Uint8Array | string,
  ): Promise<void> {
    try {
      await writeFile(this.assetPath(address, kind), data);
    } catch (error) {
      this.logger.debug(
        `Writing ${ASSET_FORMATS[kind].extension} for MAC ${address} failed: ${describe(error)}`,
      );
      throw new StoreUnavailableError(
        `Could not write ${ASSET_FORMATS[kind].extension} image for MAC ${address}`,
        "render-and-store",
        address.format(),
        { cause: error },
      );
    }
  }
}

function describe(error: unknown): string {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}
