import {
  buildFormatSelector,
  isAudioFormat,
  normalizeFormat,
  normalizeQuality,
} from '../src/download/quality/presets';

describe('quality and format presets', () => {
  it.each([
    ['4K Ultra HD', '2160p'],
    ['1080p Full HD', '1080p'],
    ['Best Quality', 'best'],
    ['720p', '720p'],
    ['720', '720p'],
    [' 480P ', '480p'],
  ])('normalizes quality %p to %s', (input, expected) => {
    expect(normalizeQuality(input)).toBe(expected);
  });

  it('rejects unknown qualities and formats', () => {
    expect(normalizeQuality('8K')).toBeUndefined();
    expect(normalizeFormat('avi')).toBeUndefined();
  });

  it('does not take built-in object members for presets', () => {
    expect(normalizeQuality('constructor')).toBeUndefined();
    expect(normalizeQuality('toString')).toBeUndefined();
    expect(normalizeFormat('toString')).toBeUndefined();
    expect(normalizeFormat('__proto__')).toBeUndefined();
  });

  it.each([
    ['MP3 Audio', 'mp3'],
    ['WebM Video', 'webm'],
    ['MP4', 'mp4'],
    ['best', 'best'],
  ])('normalizes format %p to %s', (input, expected) => {
    expect(normalizeFormat(input)).toBe(expected);
  });

  it('knows which formats are audio only', () => {
    expect(isAudioFormat('m4a')).toBe(true);
    expect(isAudioFormat('mp4')).toBe(false);
  });

  it('builds a height-capped selector for video', () => {
    expect(buildFormatSelector('720p', 'mp4')).toEqual({
      selector: 'bestvideo[height<=720][ext=mp4]+bestaudio[ext=m4a]/best[height<=720]/best',
      extraArgs: [],
    });
  });

  it('falls back to best without a height', () => {
    expect(buildFormatSelector('best', 'webm')).toEqual({ selector: 'best', extraArgs: [] });
  });

  it('extracts audio for audio formats regardless of quality', () => {
    expect(buildFormatSelector('1080p', 'mp3')).toEqual({
      selector: 'bestaudio/best',
      extraArgs: ['-x', '--audio-format', 'mp3', '--audio-quality', '192K'],
    });
  });
});
