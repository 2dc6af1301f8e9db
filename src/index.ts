// ============================================================================
// Public API
// ============================================================================

export { VERSION } from './version.js';

export {
    ApiError,
    ClientError,
    RequestTimeoutError,
    ValidationError,
    maskToken,
    redactUrl,
} from './errors.js';
export type { ApiErrorDetails } from './errors.js';

export {
    APOD_FIRST_DATE,
    ApodClient,
    apodPageUrl,
    isImageApod,
    isVideoApod,
    mapApod,
} from './services/apod.service.js';
export { MarsRoverPhotosClient, ROVER_CAMERAS, mapMarsPhoto, mapManifest } from './services/mars-rover.service.js';
export { TECHTRANSFER_CATEGORIES, TechTransferClient } from './services/techtransfer.service.js';

export {
    APOD_HASHTAGS,
    INSTAGRAM_CAPTION_MAX_LENGTH,
    buildApodCaption,
    buildPreviewCaption,
    captionInputFromApod,
    isCaptionWithinLimit,
    truncateAtWord,
} from './services/caption.service.js';
export { InstagramGraphClient, describeGraphError } from './services/instagram-graph.service.js';
export { InstagramUnofficialClient } from './services/instagram-unofficial.service.js';
export type { IgClient, IgClientFactory, IgLoggedInUser } from './services/instagram-unofficial.service.js';
export { INSTAGRAM_IMAGE_LIMITS, downloadImage, validateImage } from './services/instagram-media.service.js';
export { postRandomApodUnofficial, postRandomApodViaGraph } from './services/apod-publisher.service.js';
export { ACCESS_TOKEN_FILENAME, checkTokenExpiry, renewTokenIfNeeded } from './services/token-renewal.service.js';
export { describeSecrets, linkedAccountIds, parseTokenChoice, toLongLivedToken } from './services/credential-setup.service.js';

export type * from './types/nasa.types.js';
export type * from './types/instagram.types.js';
