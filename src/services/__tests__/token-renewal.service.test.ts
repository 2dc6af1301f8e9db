import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { renewTokenIfNeeded, type RenewalDeps } from '../token-renewal.service.js';
import { silenceConsole } from './fetch-stub.js';
import type { LongLivedToken, TokenDebugInfo } from '../../types/instagram.types.js';

function debugInfo(daysRemaining: number | undefined): TokenDebugInfo {
    return {
        isValid: true,
        expiresAt: daysRemaining === undefined ? 0 : 1_800_000_000,
        scopes: ['instagram_basic'],
        daysRemaining,
    };
}

function deps(current: number | undefined, renewed: number | undefined = 60) {
    const exchange = vi.fn((_appId: string, _appSecret: string): Promise<LongLivedToken> =>
        Promise.resolve({ accessToken: 'renewed-token', expiresIn: 5_184_000 })
    );
    const clientFor = vi.fn((_token: string) => ({
        debugToken: () => Promise.resolve(debugInfo(renewed)),
    }));
    const result = {
        current: {
            debugToken: () => Promise.resolve(debugInfo(current)),
            exchangeForLongLivedToken: exchange,
        },
        clientFor,
        appId: 'app-id',
        appSecret: 'test-secret',
        exchange,
    };
    return result satisfies RenewalDeps;
}

describe('renewTokenIfNeeded', () => {
    beforeEach(() => {
        silenceConsole();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('does nothing while more than seven days remain', async () => {
        const d = deps(30);

        await expect(renewTokenIfNeeded(d)).resolves.toEqual({ status: 'not-needed', daysRemaining: 30 });
        expect(d.exchange).not.toHaveBeenCalled();
    });

    it('renews at seven days and verifies the new token', async () => {
        const d = deps(7);

        const outcome = await renewTokenIfNeeded(d);

        expect(outcome).toEqual({
            status: 'renewed',
            token: { accessToken: 'renewed-token', expiresIn: 5_184_000 },
            daysRemaining: 60,
        });
        expect(d.exchange).toHaveBeenCalledWith('app-id', 'test-secret');
        expect(d.clientFor).toHaveBeenCalledWith('renewed-token');
    });

    it('renews when the expiry cannot be read', async () => {
        const d = deps(undefined);

        await expect(renewTokenIfNeeded(d)).resolves.toMatchObject({ status: 'renewed' });
    });

    it('fails when the new token does not verify', async () => {
        const d = deps(2, 0);

        await expect(renewTokenIfNeeded(d)).resolves.toEqual({ status: 'failed', reason: 'New token verification failed' });
    });

    it('fails when the exchange is rejected', async () => {
        const d = deps(2);
        d.exchange.mockRejectedValueOnce(new Error('Graph API error: Error validating client secret'));

        await expect(renewTokenIfNeeded(d)).resolves.toEqual({
            status: 'failed',
            reason: 'Token renewal failed: Graph API error: Error validating client secret',
        });
    });
});
