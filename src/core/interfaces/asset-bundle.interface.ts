/**
 * Contracts for the two external collaborators of art extraction: a bundle
 * unpacker that enumerates typed assets, and an image codec that turns an
 * encoded image into raw pixels.
 */

export interface BundleAsset {
  /** Container path of the asset inside the bundle, e.g. `assets/.../12345_AIF.png` */
  containerPath: string;
  /** Engine type name, e.g. `Texture2D`, `Sprite`, `TextAsset` */
  typeName: string;
  /** Encoded (PNG) bytes of the asset's image */
  readImage(): Promise<Buffer>;
}

export interface IAssetBundleUnpacker {
  load(bundlePath: string): Promise<BundleAsset[]>;
}

export interface RasterImage {
  width: number;
  height: number;
  channels: number;
  /** Interleaved 8-bit pixel data, row-major */
  data: Buffer;
}

export interface IImageDecoder {
  decode(encoded: Buffer): Promise<RasterImage>;
}

/** Image-role label (`image`, `util`, or an inferred suffix) to decoded image. */
export type ArtResult = Record<string, RasterImage>;
