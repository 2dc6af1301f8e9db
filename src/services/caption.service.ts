// ============================================================================
// Caption Service — Instagram captions for APOD posts
// ============================================================================

import { apodToday } from './dates.js';
import type { ApodRecord } from '../types/nasa.types.js';
import type { CaptionInput } from '../types/instagram.types.js';

export const INSTAGRAM_CAPTION_MAX_LENGTH = 2200;
export const MAX_EXPLANATION_LENGTH = 1200;
export const MAX_HASHTAGS = 25;

export const DEFAULT_CAPTION_TITLE = 'Astronomy Picture of the Day';

export const APOD_HASHTAGS: readonly string[] = [
    '#NASA', '#APOD', '#astronomy', '#space', '#astrophotography', '#cosmos',
    '#universe', '#science', '#telescope', '#hubble', '#jwst', '#spaceexploration',
    '#dailyastronomy', '#stars', '#galaxy', '#nebula', '#planet', '#solarsystem',
    '#astro', '#nightsky', '#deepspace', '#spaceart', '#astronomypic', '#nasapic',
    '#spacelove', '#stargazing', '#cosmology',
];

const PREVIEW_HASHTAGS = '#NASA #APOD #astronomy #space #astrophotography #cosmos';

/**
 * Cuts text longer than maxLength back to the last space inside the limit
 * and appends "...". Text without any space is cut at maxLength.
 */
export function truncateAtWord(text: string, maxLength = MAX_EXPLANATION_LENGTH): string {
    if (text.length <= maxLength) return text;
    const cut = text.slice(0, maxLength);
    const lastSpace = cut.lastIndexOf(' ');
    return `${lastSpace === -1 ? cut : cut.slice(0, lastSpace)}...`;
}

export function captionInputFromApod(apod: ApodRecord): CaptionInput {
    return {
        title: apod.title,
        date: apod.date,
        explanation: apod.explanation,
        copyright: apod.copyright,
    };
}

/**
 * Full caption used when posting:
 *
 *   🌟 {title}
 *   📅 {date}
 *
 *   {explanation, ≤1200 chars}
 *
 *   📸 Credit: {copyright}      (only with a copyright)
 *
 *   🚀 From NASA's Astronomy Picture of the Day archives
 *   🔗 https://apod.nasa.gov/apod/
 *
 *   #NASA #APOD ... (25 hashtags)
 */
export function buildApodCaption(input: CaptionInput): string {
    const title = input.title || DEFAULT_CAPTION_TITLE;
    const date = input.date || apodToday();
    const explanation = truncateAtWord(input.explanation ?? '');

    const parts = [`🌟 ${title}`, `📅 ${date}`, '', explanation, ''];

    if (input.copyright) {
        parts.push(`📸 Credit: ${input.copyright}`, '');
    }

    parts.push(
        "🚀 From NASA's Astronomy Picture of the Day archives",
        '🔗 https://apod.nasa.gov/apod/',
        ''
    );

    parts.push(APOD_HASHTAGS.slice(0, MAX_HASHTAGS).join(' '));

    return parts.join('\n');
}

/**
 * Shorter caption shown by the preview script. The explanation is cut at
 * exactly 1200 characters.
 */
export function buildPreviewCaption(input: CaptionInput): string {
    let explanation = input.explanation ?? '';
    if (explanation.length > MAX_EXPLANATION_LENGTH) {
        explanation = `${explanation.slice(0, MAX_EXPLANATION_LENGTH)}...`;
    }

    const parts = [
        `🌟 ${input.title || DEFAULT_CAPTION_TITLE}`,
        `📅 ${input.date || 'Unknown'}`,
        '',
        explanation,
        '',
    ];

    if (input.copyright) {
        parts.push(`📸 Credit: ${input.copyright}`, '');
    }

    parts.push("🚀 Brought to you by NASA's Astronomy Picture of the Day", '', PREVIEW_HASHTAGS);

    return parts.join('\n');
}

export function isCaptionWithinLimit(caption: string): boolean {
    return caption.length <= INSTAGRAM_CAPTION_MAX_LENGTH;
}
