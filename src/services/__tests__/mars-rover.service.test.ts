import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../errors.js';
import { MarsRoverPhotosClient, mapManifest, mapMarsPhoto, mapMarsPhotos } from '../mars-rover.service.js';
import { calledUrl, jsonResponse, silenceConsole, stubFetch } from './fetch-stub.js';

const photoPayload = {
    id: 102693,
    sol: 1000,
    camera: { id: 22, name: 'MAST', rover_id: 5, full_name: 'Mast Camera' },
    img_src: 'https://mars.nasa.gov/msl-raw-images/msss/01000/mcam/1000MR0044631300503690E01_DXXX.jpg',
    earth_date: '2015-05-30',
    rover: { id: 5, name: 'Curiosity', landing_date: '2012-08-06', launch_date: '2011-11-26', status: 'active' },
};

describe('mapMarsPhoto', () => {
    it('maps a full photo', () => {
        expect(mapMarsPhoto(photoPayload)).toEqual({
            id: 102693,
            sol: 1000,
            imgSrc: photoPayload.img_src,
            earthDate: '2015-05-30',
            camera: { id: 22, name: 'MAST', fullName: 'Mast Camera' },
            rover: {
                id: 5,
                name: 'Curiosity',
                status: 'active',
                landingDate: '2012-08-06',
                launchDate: '2011-11-26',
            },
        });
    });

    it('leaves the camera full name undefined when it is missing', () => {
        const photo = mapMarsPhoto({ ...photoPayload, camera: { name: 'FHAZ' } });
        expect(photo?.camera).toEqual({ id: undefined, name: 'FHAZ', fullName: undefined });
    });

    it('drops photos without id or image source', () => {
        const photos = mapMarsPhotos([photoPayload, { ...photoPayload, id: undefined }, { ...photoPayload, img_src: '' }]);
        expect(photos).toHaveLength(1);
    });
});

describe('mapManifest', () => {
    it('maps the manifest and its sols', () => {
        const manifest = mapManifest({
            photo_manifest: {
                name: 'Curiosity',
                landing_date: '2012-08-06',
                launch_date: '2011-11-26',
                status: 'active',
                max_sol: 4102,
                max_date: '2024-02-19',
                total_photos: 695670,
                photos: [{ sol: 0, earth_date: '2012-08-06', total_photos: 3702, cameras: ['CHEMCAM', 'FHAZ'] }],
            },
        });

        expect(manifest.maxSol).toBe(4102);
        expect(manifest.totalPhotos).toBe(695670);
        expect(manifest.photos).toEqual([{ sol: 0, earthDate: '2012-08-06', totalPhotos: 3702, cameras: ['CHEMCAM', 'FHAZ'] }]);
    });
});

describe('MarsRoverPhotosClient', () => {
    let client: MarsRoverPhotosClient;

    beforeEach(() => {
        silenceConsole();
        client = new MarsRoverPhotosClient({ apiKey: 'test-key' });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('lists rovers and cameras', () => {
        expect(client.getAvailableRovers()).toEqual(['curiosity', 'opportunity', 'spirit', 'perseverance']);
        expect(client.getRoverCameras('Curiosity')).toEqual(['FHAZ', 'RHAZ', 'MAST', 'CHEMCAM', 'MAHLI', 'MARDI', 'NAVCAM']);
    });

    it('rejects unknown rovers', () => {
        expect(() => client.getRoverCameras('sojourner'))
            .toThrow('Unknown rover "sojourner". Available: curiosity, opportunity, spirit, perseverance');
    });

    it('requests photos by sol with a lower-cased camera', async () => {
        const fetchMock = stubFetch(jsonResponse({ photos: [photoPayload] }));

        const photos = await client.getPhotosBySol('curiosity', 1000, { camera: 'mast' });

        const url = calledUrl(fetchMock);
        expect(url.pathname).toBe('/mars-photos/api/v1/rovers/curiosity/photos');
        expect(url.searchParams.get('sol')).toBe('1000');
        expect(url.searchParams.get('camera')).toBe('mast');
        expect(url.searchParams.get('api_key')).toBe('test-key');
        expect(photos[0]?.id).toBe(102693);
    });

    it('rejects a camera the rover does not carry', async () => {
        const fetchMock = stubFetch();

        await expect(client.getPhotosBySol('spirit', 1, { camera: 'MAST' })).rejects.toThrow(ValidationError);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('rejects negative sols', async () => {
        await expect(client.getPhotosBySol('curiosity', -1)).rejects.toThrow('sol must be a non-negative integer, got -1');
    });

    it('reads latest_photos for the latest endpoint', async () => {
        const fetchMock = stubFetch(jsonResponse({ latest_photos: [photoPayload, photoPayload] }));

        const photos = await client.getLatestPhotos('curiosity');

        expect(calledUrl(fetchMock).pathname).toBe('/mars-photos/api/v1/rovers/curiosity/latest_photos');
        expect(photos).toHaveLength(2);
    });

    it('requests photos by Earth date', async () => {
        const fetchMock = stubFetch(jsonResponse({ photos: [] }));

        await client.getPhotosByEarthDate('curiosity', '2015-05-30', { camera: 'FHAZ' });

        expect(calledUrl(fetchMock).searchParams.get('earth_date')).toBe('2015-05-30');
    });

    it('sends a valid page number', async () => {
        const fetchMock = stubFetch(jsonResponse({ photos: [] }));

        await client.getPhotosBySol('perseverance', 100, { page: 2 });

        expect(calledUrl(fetchMock).searchParams.get('page')).toBe('2');
    });

    it('rejects page numbers that are not positive integers', async () => {
        const fetchMock = stubFetch();

        await expect(client.getPhotosBySol('curiosity', 1000, { page: 0 })).rejects.toThrow('page must be a positive integer, got 0');
        await expect(client.getPhotosByEarthDate('curiosity', '2015-05-30', { page: 1.5 }))
            .rejects.toThrow('page must be a positive integer, got 1.5');
        expect(fetchMock).not.toHaveBeenCalled();
    });
});
