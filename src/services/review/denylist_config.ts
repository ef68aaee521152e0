import fs from 'fs';
import { z } from 'zod';
import { config } from '../../config';
import { logger } from '../../utils/logger';
import { TargetingDenylists } from './types';

const EntrySchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    label: z.string().min(1)
});

const DenylistFileSchema = z.object({
    meta: z.array(EntrySchema).default([]),
    tiktok: z.array(EntrySchema).default([]),
    google: z.array(EntrySchema).default([])
});

export function parseDenylists(raw: unknown): TargetingDenylists {
    return DenylistFileSchema.parse(raw);
}

export class DenylistConfigService {
    private static instance: DenylistConfigService | undefined;

    private constructor(private readonly denylists: TargetingDenylists) {}

    public static getInstance(): DenylistConfigService {
        if (!this.instance) {
            this.instance = new DenylistConfigService(DenylistConfigService.loadFile(config.denylistPath));
        }
        return this.instance;
    }

    public static loadFile(filePath: string): TargetingDenylists {
        const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        const denylists = parseDenylists(raw);
        logger.info('[Denylist] Loaded targeting denylists', {
            path: filePath,
            meta: denylists.meta.length,
            tiktok: denylists.tiktok.length,
            google: denylists.google.length
        });
        return denylists;
    }

    public getDenylists(): TargetingDenylists {
        return this.denylists;
    }
}
