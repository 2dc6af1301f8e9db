// ============================================================================
// NASA APIs — Records
// ============================================================================
// Read-only records built from APOD, Mars Rover Photos and TechTransfer
// responses. Optional upstream fields stay undefined when absent.
// ============================================================================

// ── Shared ─────────────────────────────────────────────────────────────────

export interface NasaClientOptions {
    /** Falls back to NASA_API_KEY, then DEMO_KEY */
    apiKey?: string;
    timeoutMs?: number;
}

/** A date as YYYY-MM-DD or a Date (its UTC day is used) */
export type DateInput = string | Date;

// ── APOD ───────────────────────────────────────────────────────────────────

export type ApodMediaType = 'image' | 'video' | 'other';

export interface ApodRecord {
    readonly title: string;
    readonly date: string;                    // YYYY-MM-DD
    readonly explanation: string;
    readonly mediaType: ApodMediaType;
    readonly url?: string;
    readonly hdurl?: string;
    readonly copyright?: string;
    readonly thumbnailUrl?: string;           // only with thumbs=true on videos
    readonly serviceVersion?: string;
}

export interface ApodQuery {
    date?: DateInput;
    hd?: boolean;
    thumbs?: boolean;
}

export interface RandomImageResult {
    apod: ApodRecord;
    isImage: boolean;
    attempts: number;
}

// ── Mars Rover Photos ──────────────────────────────────────────────────────

export type RoverName = 'curiosity' | 'opportunity' | 'spirit' | 'perseverance';

export interface MarsCamera {
    readonly id?: number;
    readonly name: string;
    readonly fullName?: string;
}

export interface MarsRover {
    readonly id?: number;
    readonly name: string;
    readonly status?: string;
    readonly landingDate?: string;
    readonly launchDate?: string;
}

export interface MarsPhotoRecord {
    readonly id: number;
    readonly sol: number;
    readonly camera: MarsCamera;
    readonly imgSrc: string;
    readonly earthDate: string;
    readonly rover: MarsRover;
}

export interface MarsPhotoQuery {
    camera?: string;
    page?: number;
}

export interface MarsManifestSol {
    readonly sol: number;
    readonly earthDate: string;
    readonly totalPhotos: number;
    readonly cameras: string[];
}

export interface MarsManifest {
    readonly name: string;
    readonly status: string;
    readonly landingDate: string;
    readonly launchDate: string;
    readonly maxSol: number;
    readonly maxDate: string;
    readonly totalPhotos: number;
    readonly photos: MarsManifestSol[];
}

// ── TechTransfer ───────────────────────────────────────────────────────────

export type TechTransferCategory = 'patent' | 'software' | 'spinoff';

interface TechTransferBase {
    readonly id: string;
    readonly title: string;
    readonly description: string;
    readonly category?: string;
    readonly center?: string;
    readonly imageUrl?: string;
}

export interface PatentRecord extends TechTransferBase {
    readonly kind: 'patent';
    readonly caseNumber?: string;
    readonly patentNumber?: string;
}

export interface SoftwareRecord extends TechTransferBase {
    readonly kind: 'software';
    readonly caseNumber?: string;
    readonly releaseType?: string;
    readonly softwareUrl?: string;
}

export interface SpinoffRecord extends TechTransferBase {
    readonly kind: 'spinoff';
    readonly company?: string;
    readonly state?: string;
    readonly publicationYear?: string;
}

export type TechTransferRecord = PatentRecord | SoftwareRecord | SpinoffRecord;

export interface TechTransferSearchOptions {
    /** Keep at most this many rows of the returned page */
    limit?: number;
    page?: number;
}

export interface TechTransferSearchResult<T extends TechTransferRecord> {
    readonly results: T[];
    readonly count: number;                   // rows in this page, before limit
    readonly total: number;
    readonly page: number;
    readonly perPage: number;
}

export type TechTransferSearchAllEntry =
    | { category: 'patent'; result: TechTransferSearchResult<PatentRecord> }
    | { category: 'software'; result: TechTransferSearchResult<SoftwareRecord> }
    | { category: 'spinoff'; result: TechTransferSearchResult<SpinoffRecord> }
    | { category: TechTransferCategory; error: string };
