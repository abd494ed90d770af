import { injectable } from 'inversify';
import sharp from 'sharp';
import type { IImageDecoder, RasterImage } from '../../core/interfaces/asset-bundle.interface.js';

/**
 * Decodes PNG/JPEG/WebP bytes to 3-channel RGB pixels; alpha is flattened
 * away so every role has the same layout.
 */
@injectable()
export class SharpImageDecoder implements IImageDecoder {
  async decode(encoded: Buffer): Promise<RasterImage> {
    const { data, info } = await sharp(encoded).removeAlpha().raw().toBuffer({ resolveWithObject: true });
    return {
      width: info.width,
      height: info.height,
      channels: info.channels,
      data
    };
  }
}
