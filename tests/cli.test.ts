import { main, parseCliArgs } from '../src/index';
import { RateLimitConfigError } from '../src/download/core/errors';

describe('command line', () => {
  describe('parseCliArgs', () => {
    it('reads URLs and options', () => {
      const options = parseCliArgs([
        'https://media.example.com/v1',
        'https://media.example.com/v2',
        '-q',
        '1080',
        '-f',
        'MP3 Audio',
        '-l',
        '2048',
        '--resume',
        '-o',
        '/tmp/out',
      ]);

      expect(options).toEqual({
        urls: ['https://media.example.com/v1', 'https://media.example.com/v2'],
        quality: '1080p',
        format: 'mp3',
        output: '/tmp/out',
        limit: 2048,
        resume: true,
        verbose: false,
        help: false,
      });
    });

    it('leaves unset options to the configuration', () => {
      expect(parseCliArgs(['https://media.example.com/v1'])).toEqual({
        urls: ['https://media.example.com/v1'],
        quality: undefined,
        format: undefined,
        output: undefined,
        limit: undefined,
        resume: false,
        verbose: false,
        help: false,
      });
    });

    it('rejects an unknown quality or format', () => {
      expect(() => parseCliArgs(['-q', '8K'])).toThrow('Unknown quality "8K"');
      expect(() => parseCliArgs(['-f', 'avi'])).toThrow('Unknown format "avi"');
    });

    it.each(['--limit=-5', '--limit=fast', '--limit='])('rejects the bandwidth limit %s', (flag) => {
      expect(() => parseCliArgs([flag])).toThrow(RateLimitConfigError);
    });
  });

  describe('main', () => {
    let stdout: jest.SpyInstance;
    let stderr: jest.SpyInstance;

    beforeEach(() => {
      stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
      stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('prints usage for --help', async () => {
      await expect(main(['--help'])).resolves.toBe(0);
      expect(stdout).toHaveBeenCalledWith(expect.stringMatching(/^Usage: media-queue <url\.\.\.>/));
    });

    it('exits with 2 when there is nothing to do', async () => {
      await expect(main([])).resolves.toBe(2);
    });

    it('exits with 2 on bad arguments', async () => {
      await expect(main(['-q', '8K', 'https://media.example.com/v1'])).resolves.toBe(2);
      expect(stderr).toHaveBeenCalledWith(expect.stringMatching(/^Unknown quality "8K"\nUsage:/));
    });

    it('exits with 2 on an unknown flag', async () => {
      await expect(main(['--bogus'])).resolves.toBe(2);
    });
  });
});
