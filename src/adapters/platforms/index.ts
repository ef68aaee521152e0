import { Platform, resolvePlatform } from '../../core/contracts';
import { UnknownPlatformError } from '../../core/errors';
import { googleAdapter } from './google';
import { metaAdapter } from './meta';
import { tiktokAdapter } from './tiktok';
import { PlatformAdapter } from './types';

export const PLATFORM_ADAPTERS: Record<Platform, PlatformAdapter> = {
    meta: metaAdapter,
    tiktok: tiktokAdapter,
    google: googleAdapter
};

export function getAdapter(platformName: string): PlatformAdapter {
    const platform = resolvePlatform(platformName);
    if (!platform) throw new UnknownPlatformError(platformName);
    return PLATFORM_ADAPTERS[platform];
}

export { PlatformAdapter, EncodeInput } from './types';
