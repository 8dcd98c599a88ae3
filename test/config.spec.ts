import { describe, expect, it } from 'vitest';
import { createCampaignConfig } from '~/proxy_tester/config';
import { ConfigError } from '~/proxy_tester/errors';

describe('createCampaignConfig', () => {
    it('should build a frozen config from all three parameters', () => {
        const result = createCampaignConfig({ url: 'https://example.com', workers: 10, timeout: 5000 });

        expect(result.ok).toBe(true);

        if (result.ok) {
            expect(result.config).toEqual({ url: 'https://example.com', workers: 10, timeout: 5000 });
            expect(Object.isFrozen(result.config)).toBe(true);
        }
    });

    it('should take a plain http target', () => {
        expect(createCampaignConfig({ url: 'http://example.com/', workers: 1, timeout: 100 }).ok).toBe(true);
    });

    it('should name every missing parameter', () => {
        const result = createCampaignConfig({});

        expect(result.ok).toBe(false);

        if (!result.ok) {
            expect(result.error).toBeInstanceOf(ConfigError);
            expect(result.error.issues).toEqual([ 'url is required', 'workers is required', 'timeout is required' ]);
            expect(result.error.message)
            .toBe('ConfigError: url is required; workers is required; timeout is required');
        }
    });

    it('should require the timeout even when the rest is set', () => {
        const result = createCampaignConfig({ url: 'https://example.com', workers: 5 });

        expect(result).toMatchObject({ ok: false, error: { issues: [ 'timeout is required' ] } });
    });

    it.each([
        [ { url: 'not a url', workers: 1, timeout: 100 }, 'url is not a valid URL' ],
        [ { url: 'ftp://example.com', workers: 1, timeout: 100 }, 'url must be http or https' ],
        [ { url: 'mailto:someone@example.com', workers: 1, timeout: 100 }, 'url must be http or https' ],
        [ { url: 'javascript:1', workers: 1, timeout: 100 }, 'url must be http or https' ],
        [ { url: 'https://example.com', workers: 0, timeout: 100 }, 'workers must be positive' ],
        [ { url: 'https://example.com', workers: 1.5, timeout: 100 }, 'workers must be an integer' ],
        [ { url: 'https://example.com', workers: Number.NaN, timeout: 100 }, 'workers must be a number' ],
        [ { url: 'https://example.com', workers: 1, timeout: -5 }, 'timeout must be positive' ],
    ])('should reject %o', (input, issue) => {
        expect(createCampaignConfig(input)).toMatchObject({ ok: false, error: { issues: [ issue ] } });
    });
});
