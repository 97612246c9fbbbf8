/**
 * Quality and format presets offered to the user, and the yt-dlp selectors they map to
 */

export const QUALITY_PRESETS: Readonly<Record<string, string>> = {
    '4K Ultra HD': '2160p',
    '2K QHD': '1440p',
    '1080p Full HD': '1080p',
    '720p HD': '720p',
    '480p SD': '480p',
    '360p': '360p',
    'Best Quality': 'best',
};

export const FORMAT_PRESETS: Readonly<Record<string, string>> = {
    'MP4 Video': 'mp4',
    'MP3 Audio': 'mp3',
    'WebM Video': 'webm',
    'M4A Audio': 'm4a',
    'AAC Audio': 'aac',
    'Best Format': 'best',
};

export const AUDIO_FORMATS = new Set(['mp3', 'm4a', 'aac']);

const QUALITY_CODES = new Set(Object.values(QUALITY_PRESETS));
const FORMAT_CODES = new Set(Object.values(FORMAT_PRESETS));

/**
 * Accept a preset label or a code; unknown input is rejected with undefined
 */
export function normalizeQuality(input: string): string | undefined {
    const trimmed = input.trim();
    if (Object.hasOwn(QUALITY_PRESETS, trimmed)) return QUALITY_PRESETS[trimmed];

    const lower = trimmed.toLowerCase();
    if (QUALITY_CODES.has(lower)) return lower;
    // "1080" is as good as "1080p"
    if (QUALITY_CODES.has(`${lower}p`)) return `${lower}p`;
    return undefined;
}

export function normalizeFormat(input: string): string | undefined {
    const trimmed = input.trim();
    if (Object.hasOwn(FORMAT_PRESETS, trimmed)) return FORMAT_PRESETS[trimmed];

    const lower = trimmed.toLowerCase();
    return FORMAT_CODES.has(lower) ? lower : undefined;
}

export function isAudioFormat(format: string): boolean {
    return AUDIO_FORMATS.has(format);
}

export interface FormatSelection {
    selector: string;
    /** Extra yt-dlp arguments (audio extraction) */
    extraArgs: string[];
}

/**
 * Build the yt-dlp format selection for a quality/format pair
 */
export function buildFormatSelector(quality: string, format: string): FormatSelection {
    if (isAudioFormat(format)) {
        return {
            selector: 'bestaudio/best',
            extraArgs: ['-x', '--audio-format', format, '--audio-quality', '192K'],
        };
    }

    const height = /^(\d+)p$/.exec(quality)?.[1];
    if (!height) {
        return { selector: 'best', extraArgs: [] };
    }

    return {
        selector: `bestvideo[height<=${height}][ext=mp4]+bestaudio[ext=m4a]/best[height<=${height}]/best`,
        extraArgs: [],
    };
}
