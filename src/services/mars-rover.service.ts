// ============================================================================
// Mars Rover Photos Service
// ============================================================================
// GET https://api.nasa.gov/mars-photos/api/v1/...
//  - /rovers/{rover}/photos?sol=|earth_date=   photos by sol or Earth day
//  - /rovers/{rover}/latest_photos              most recent sol
//  - /manifests/{rover}                         mission manifest
// ============================================================================

import { resolveNasaApiKey } from '../config.js';
import { ApiError, ValidationError } from '../errors.js';
import { DEFAULT_TIMEOUT_MS, requestJson, type QueryParams } from './http.js';
import { toIsoDay } from './dates.js';
import { asArray, asNumber, asString, asStringArray, isRecord, type JsonRecord } from './json.js';
import type {
    DateInput,
    MarsManifest,
    MarsManifestSol,
    MarsPhotoQuery,
    MarsPhotoRecord,
    NasaClientOptions,
    RoverName,
} from '../types/nasa.types.js';

export const MARS_API_BASE = 'https://api.nasa.gov/mars-photos/api/v1';

export const ROVER_CAMERAS: Readonly<Record<RoverName, readonly string[]>> = {
    curiosity: ['FHAZ', 'RHAZ', 'MAST', 'CHEMCAM', 'MAHLI', 'MARDI', 'NAVCAM'],
    opportunity: ['FHAZ', 'RHAZ', 'NAVCAM', 'PANCAM', 'MINITES'],
    spirit: ['FHAZ', 'RHAZ', 'NAVCAM', 'PANCAM', 'MINITES'],
    perseverance: [
        'EDL_RUCAM', 'EDL_RDCAM', 'EDL_DDCAM', 'EDL_PUCAM1', 'EDL_PUCAM2',
        'NAVCAM_LEFT', 'NAVCAM_RIGHT', 'MCZ_LEFT', 'MCZ_RIGHT',
        'FRONT_HAZCAM_LEFT_A', 'FRONT_HAZCAM_RIGHT_A', 'REAR_HAZCAM_LEFT', 'REAR_HAZCAM_RIGHT',
        'SKYCAM', 'SHERLOC_WATSON', 'SUPERCAM_RMI', 'LCAM',
    ],
};

const ROVERS: readonly RoverName[] = ['curiosity', 'opportunity', 'spirit', 'perseverance'];

export function normalizeRover(rover: string): RoverName {
    const wanted = rover.trim().toLowerCase();
    const name = ROVERS.find(candidate => candidate === wanted);
    if (!name) {
        throw new ValidationError(`Unknown rover "${rover}". Available: ${ROVERS.join(', ')}`);
    }
    return name;
}

// ── Mapping ────────────────────────────────────────────────────────────────

/**
 * Maps one photo object. Returns null when id or img_src is missing.
 */
export function mapMarsPhoto(raw: unknown): MarsPhotoRecord | null {
    if (!isRecord(raw)) return null;

    const id = asNumber(raw.id);
    const imgSrc = asString(raw.img_src);
    if (id === undefined || !imgSrc) return null;

    const camera: JsonRecord = isRecord(raw.camera) ? raw.camera : {};
    const rover: JsonRecord = isRecord(raw.rover) ? raw.rover : {};

    return {
        id,
        sol: asNumber(raw.sol) ?? 0,
        imgSrc,
        earthDate: asString(raw.earth_date) ?? '',
        camera: {
            id: asNumber(camera.id),
            name: asString(camera.name) ?? '',
            fullName: asString(camera.full_name) || undefined,
        },
        rover: {
            id: asNumber(rover.id),
            name: asString(rover.name) ?? '',
            status: asString(rover.status) || undefined,
            landingDate: asString(rover.landing_date) || undefined,
            launchDate: asString(rover.launch_date) || undefined,
        },
    };
}

export function mapMarsPhotos(list: unknown): MarsPhotoRecord[] {
    return asArray(list)
        .map(mapMarsPhoto)
        .filter((photo): photo is MarsPhotoRecord => photo !== null);
}

export function mapManifest(raw: unknown): MarsManifest {
    const manifest = isRecord(raw) && isRecord(raw.photo_manifest) ? raw.photo_manifest : null;
    if (!manifest) {
        throw new ApiError('Unexpected manifest payload', { url: MARS_API_BASE, status: 200 });
    }

    const photos: MarsManifestSol[] = asArray(manifest.photos)
        .filter(isRecord)
        .map(entry => ({
            sol: asNumber(entry.sol) ?? 0,
            earthDate: asString(entry.earth_date) ?? '',
            totalPhotos: asNumber(entry.total_photos) ?? 0,
            cameras: asStringArray(entry.cameras),
        }));

    return {
        name: asString(manifest.name) ?? '',
        status: asString(manifest.status) ?? '',
        landingDate: asString(manifest.landing_date) ?? '',
        launchDate: asString(manifest.launch_date) ?? '',
        maxSol: asNumber(manifest.max_sol) ?? 0,
        maxDate: asString(manifest.max_date) ?? '',
        totalPhotos: asNumber(manifest.total_photos) ?? 0,
        photos,
    };
}

// ── Client ─────────────────────────────────────────────────────────────────

export class MarsRoverPhotosClient {
    private readonly apiKey: string;
    private readonly timeoutMs: number;

    constructor(options: NasaClientOptions = {}) {
        this.apiKey = resolveNasaApiKey(options.apiKey);
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    private async get(path: string, params: QueryParams = {}): Promise<unknown> {
        return requestJson(`${MARS_API_BASE}${path}`, {
            params: { api_key: this.apiKey, ...params },
            timeoutMs: this.timeoutMs,
        });
    }

    private photoParams(rover: RoverName, query: MarsPhotoQuery): QueryParams {
        const params: QueryParams = {};
        if (query.camera !== undefined) {
            const camera = query.camera.trim().toUpperCase();
            if (!ROVER_CAMERAS[rover].includes(camera)) {
                throw new ValidationError(
                    `Camera "${query.camera}" is not available on ${rover}. Available: ${ROVER_CAMERAS[rover].join(', ')}`
                );
            }
            params.camera = camera.toLowerCase();
        }
        if (query.page !== undefined) {
            if (!Number.isInteger(query.page) || query.page < 1) {
                throw new ValidationError(`page must be a positive integer, got ${query.page}`);
            }
            params.page = query.page;
        }
        return params;
    }

    getAvailableRovers(): RoverName[] {
        return [...ROVERS];
    }

    getRoverCameras(rover: string): string[] {
        return [...ROVER_CAMERAS[normalizeRover(rover)]];
    }

    async getPhotosBySol(rover: string, sol: number, query: MarsPhotoQuery = {}): Promise<MarsPhotoRecord[]> {
        const name = normalizeRover(rover);
        if (!Number.isInteger(sol) || sol < 0) {
            throw new ValidationError(`sol must be a non-negative integer, got ${sol}`);
        }

        const data = await this.get(`/rovers/${name}/photos`, { sol, ...this.photoParams(name, query) });
        return mapMarsPhotos(isRecord(data) ? data.photos : undefined);
    }

    async getPhotosByEarthDate(rover: string, earthDate: DateInput, query: MarsPhotoQuery = {}): Promise<MarsPhotoRecord[]> {
        const name = normalizeRover(rover);
        const day = toIsoDay(earthDate, 'earthDate');

        const data = await this.get(`/rovers/${name}/photos`, { earth_date: day, ...this.photoParams(name, query) });
        return mapMarsPhotos(isRecord(data) ? data.photos : undefined);
    }

    async getLatestPhotos(rover: string): Promise<MarsPhotoRecord[]> {
        const name = normalizeRover(rover);
        const data = await this.get(`/rovers/${name}/latest_photos`);
        return mapMarsPhotos(isRecord(data) ? data.latest_photos : undefined);
    }

    async getManifest(rover: string): Promise<MarsManifest> {
        const name = normalizeRover(rover);
        return mapManifest(await this.get(`/manifests/${name}`));
    }
}
