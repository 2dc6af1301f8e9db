import { describe, expect, it } from 'vitest';
import {
    buildApodCaption,
    buildPreviewCaption,
    isCaptionWithinLimit,
    truncateAtWord,
} from '../caption.service.js';

describe('truncateAtWord', () => {
    it('leaves short text alone', () => {
        expect(truncateAtWord('short text')).toBe('short text');
    });

    it('cuts at the last word boundary inside 1200 characters and appends "..."', () => {
        const text = 'word '.repeat(300);

        const truncated = truncateAtWord(text);

        expect(truncated).toBe(`${Array(240).fill('word').join(' ')}...`);
        expect(truncated.length).toBe(1202);
    });

    it('cuts mid-word when there is no space to fall back to', () => {
        expect(truncateAtWord('abcdefghij', 4)).toBe('abcd...');
    });
});

describe('buildApodCaption', () => {
    it('lays out title, date, explanation, credit, source and hashtags', () => {
        const caption = buildApodCaption({
            title: 'The Horsehead Nebula',
            date: '2024-01-15',
            explanation: 'A dark cloud of dust and gas.',
            copyright: 'Jane Doe',
        });

        const lines = caption.split('\n');
        expect(lines.slice(0, 10)).toEqual([
            '🌟 The Horsehead Nebula',
            '📅 2024-01-15',
            '',
            'A dark cloud of dust and gas.',
            '',
            '📸 Credit: Jane Doe',
            '',
            "🚀 From NASA's Astronomy Picture of the Day archives",
            '🔗 https://apod.nasa.gov/apod/',
            '',
        ]);
        expect(lines).toHaveLength(11);

        const hashtags = lines[10]?.split(' ') ?? [];
        expect(hashtags).toHaveLength(25);
        expect(hashtags[0]).toBe('#NASA');
        expect(hashtags[24]).toBe('#spacelove');
    });

    it('omits the credit block without a copyright', () => {
        const caption = buildApodCaption({ title: 'T', date: '2024-01-15', explanation: 'E' });

        expect(caption).not.toContain('📸 Credit:');
        expect(caption.split('\n').slice(3, 6)).toEqual(['E', '', "🚀 From NASA's Astronomy Picture of the Day archives"]);
    });

    it('stays within the Instagram caption limit for very long explanations', () => {
        const caption = buildApodCaption({ title: 'T', date: '2024-01-15', explanation: 'stars '.repeat(1000), copyright: 'Jane Doe' });
        expect(isCaptionWithinLimit(caption)).toBe(true);
    });
});

describe('buildPreviewCaption', () => {
    it('cuts the explanation at exactly 1200 characters', () => {
        const caption = buildPreviewCaption({ title: 'T', explanation: 'x'.repeat(1300) });

        const lines = caption.split('\n');
        expect(lines[1]).toBe('📅 Unknown');
        expect(lines[3]).toBe(`${'x'.repeat(1200)}...`);
        expect(lines.slice(-3)).toEqual([
            "🚀 Brought to you by NASA's Astronomy Picture of the Day",
            '',
            '#NASA #APOD #astronomy #space #astrophotography #cosmos',
        ]);
    });
});
