// ============================================================================
// Config — lazy accessors over process.env
// ============================================================================

export const DEMO_API_KEY = 'DEMO_KEY';
export const DEFAULT_GRAPH_API_VERSION = 'v18.0';

export const NASA_API_KEY = () => process.env.NASA_API_KEY || '';

export const INSTAGRAM_USERNAME = () => process.env.INSTAGRAM_USERNAME || '';
export const INSTAGRAM_PASSWORD = () => process.env.INSTAGRAM_PASSWORD || '';
export const INSTAGRAM_SESSION_FILE = () => process.env.INSTAGRAM_SESSION_FILE || '';
export const INSTAGRAM_PROXY_URL = () => process.env.INSTAGRAM_PROXY_URL || '';
export const SESSION_ENCRYPTION_KEY = () => process.env.SESSION_ENCRYPTION_KEY || '';

export const INSTAGRAM_ACCESS_TOKEN = () => process.env.INSTAGRAM_ACCESS_TOKEN || '';
export const INSTAGRAM_ACCOUNT_ID = () => process.env.INSTAGRAM_ACCOUNT_ID || '';
export const FACEBOOK_APP_ID = () => process.env.FACEBOOK_APP_ID || '';
export const FACEBOOK_APP_SECRET = () => process.env.FACEBOOK_APP_SECRET || '';
export const GRAPH_API_VERSION = () => process.env.GRAPH_API_VERSION || DEFAULT_GRAPH_API_VERSION;

export const DATA_DIR = () => process.env.DATA_DIR || '';

export const GITHUB_TOKEN = () => process.env.GITHUB_TOKEN || '';
export const GITHUB_REPOSITORY = () => process.env.GITHUB_REPOSITORY || '';

/**
 * NASA key from the argument, then NASA_API_KEY, then DEMO_KEY (rate limited).
 */
export function resolveNasaApiKey(explicit?: string): string {
    if (explicit) return explicit;
    const fromEnv = NASA_API_KEY();
    if (fromEnv) return fromEnv;
    console.warn('[Config] ⚠️ NASA_API_KEY not found, using DEMO_KEY (rate limited)');
    return DEMO_API_KEY;
}
