import { z } from 'zod';
import { ConfigError } from '~/proxy_tester/errors';
import type { CampaignConfig } from '~/proxy_tester/types';

const PROBE_PROTOCOLS = [ 'http:', 'https:' ];

// Urls that don't parse at all are reported by `.url()`.
function hasProbeProtocol(url: string): boolean {
    if (!URL.canParse(url)) return true;

    return PROBE_PROTOCOLS.includes(new URL(url).protocol);
}

export const CampaignConfigSchema = z.object({
    url: z.string({ required_error: 'url is required', invalid_type_error: 'url must be a string' })
    .url('url is not a valid URL')
    .refine(hasProbeProtocol, 'url must be http or https'),
    workers: z.number({ required_error: 'workers is required', invalid_type_error: 'workers must be a number' })
    .int('workers must be an integer')
    .positive('workers must be positive'),
    timeout: z.number({ required_error: 'timeout is required', invalid_type_error: 'timeout must be a number' })
    .int('timeout must be an integer')
    .positive('timeout must be positive'),
});

export type CampaignConfigInput = Partial<z.input<typeof CampaignConfigSchema>>;

export type ConfigResult =
    | { ok: true, config: CampaignConfig }
    | { ok: false, error: ConfigError };

/**
 * Validates the three run parameters. Nothing touches the network until this succeeds.
 */
export function createCampaignConfig(input: CampaignConfigInput): ConfigResult {
    const parsed = CampaignConfigSchema.safeParse(input);

    if (!parsed.success) {
        return {
            ok: false,
            error: new ConfigError(parsed.error.issues.map((issue) => issue.message)),
        };
    }

    return { ok: true, config: Object.freeze(parsed.data) };
}
