import { injectable } from 'inversify';
import type { BundleAsset, IAssetBundleUnpacker } from '../../core/interfaces/asset-bundle.interface.js';
import { AssetBundleUnavailableError } from '../../core/errors.js';

/**
 * Default binding for `AssetBundleUnpacker`. Hosts that can read the game's
 * bundles rebind the token to a real unpacker.
 */
@injectable()
export class UnconfiguredBundleUnpacker implements IAssetBundleUnpacker {
  async load(bundlePath: string): Promise<BundleAsset[]> {
    throw new AssetBundleUnavailableError(`no unpacker is bound to open ${bundlePath}`);
  }
}
