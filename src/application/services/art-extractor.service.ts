// Card art extraction: bundle lookup, unpacking and decoding are delegated
// File: src/application/services/art-extractor.service.ts

import { globSync } from 'glob';
import path from 'node:path';
import type {
  ArtResult,
  IAssetBundleUnpacker,
  IImageDecoder
} from '../../core/interfaces/asset-bundle.interface.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'ArtExtractor' });

export const IMAGE_ASSET_TYPES: readonly string[] = ['Texture2D', 'Sprite'];
export const UTIL_MARKER = 'Util';
export const PRIMARY_ART_SUFFIX = '_AIF.';

export interface ArtExtractorOptions {
  assetsDir: string;
  fileExtension: string;
}

export function padArtId(artId: number): string {
  return String(artId).padStart(6, '0');
}

/**
 * Role label for an asset's container path. `util` and `image` are fixed
 * roles; anything else is named after the last `_` token of the base name.
 */
export function labelForAsset(containerPath: string, artId: number): string {
  if (containerPath.includes(UTIL_MARKER)) {
    return 'util';
  }
  if (containerPath.includes(`${artId}${PRIMARY_ART_SUFFIX}`)) {
    return 'image';
  }
  const baseName = path.posix.basename(containerPath);
  const stem = baseName.split('.')[0] ?? baseName;
  const tokens = stem.split('_');
  return tokens[tokens.length - 1] ?? stem;
}

export class ArtExtractor {
  constructor(
    private readonly options: ArtExtractorOptions,
    private readonly unpacker: IAssetBundleUnpacker,
    private readonly decoder: IImageDecoder
  ) {}

  findBundleFiles(artId: number): string[] {
    return globSync(`${padArtId(artId)}*${this.options.fileExtension}`, {
      cwd: this.options.assetsDir,
      nodir: true,
      absolute: true
    }).sort();
  }

  /**
   * Decoded images keyed by role. Assets sharing a label overwrite each
   * other in bundle order.
   */
  async extract(artId: number): Promise<ArtResult> {
    const result: ArtResult = {};
    const bundles = this.findBundleFiles(artId);
    log.debug({ artId, bundles: bundles.length }, 'Extracting card art');

    for (const bundlePath of bundles) {
      const assets = await this.unpacker.load(bundlePath);
      for (const asset of assets) {
        if (!IMAGE_ASSET_TYPES.includes(asset.typeName)) {
          continue;
        }
        const label = labelForAsset(asset.containerPath, artId);
        if (label in result) {
          log.debug({ artId, label, containerPath: asset.containerPath }, 'Art label already taken, overwriting');
        }
        result[label] = await this.decoder.decode(await asset.readImage());
      }
    }
    return result;
  }
}
