import {
  InvalidStateError,
  InvalidUrlError,
  RateLimitConfigError,
  ResolveError,
  TransferError,
  classifyResolveError,
  classifyTransferError,
  reasonForStatus,
} from '../src/download/core/errors';
import { ErrorKind } from '../src/download/core/types';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('error taxonomy', () => {
  it('carries a kind and the concrete class name', () => {
    const invalidUrl = new InvalidUrlError('nope', 'URL is empty');

    expect(invalidUrl.kind).toBe(ErrorKind.INVALID_URL);
    expect(invalidUrl.name).toBe('InvalidUrlError');
    expect(invalidUrl.message).toBe('Invalid media URL "nope": URL is empty');
    expect(new InvalidStateError('resume').message).toBe('Cannot resume: no job accepts this command');
    expect(new RateLimitConfigError(-5).kind).toBe(ErrorKind.RATE_LIMIT_CONFIG);
  });

  it.each([
    [401, 'restricted'],
    [403, 'restricted'],
    [451, 'restricted'],
    [404, 'not_found'],
    [410, 'not_found'],
    [408, 'timeout'],
    [504, 'timeout'],
    [502, 'unreachable'],
    [418, 'unknown'],
  ])('maps HTTP %i to %s', (status, reason) => {
    expect(reasonForStatus(status)).toBe(reason);
  });

  describe('classifyResolveError', () => {
    it('passes resolve errors through', () => {
      const original = new ResolveError('restricted', 'members only');
      expect(classifyResolveError(original)).toBe(original);
    });

    it.each([
      [withCode('getaddrinfo ENOTFOUND media.example.com', 'ENOTFOUND'), 'unreachable'],
      [withCode('connect ETIMEDOUT', 'ETIMEDOUT'), 'timeout'],
      [new Error('Read timed out'), 'timeout'],
      [new Error('ERROR: Private video. Sign in if you have access'), 'restricted'],
      [new Error('ERROR: Video unavailable'), 'not_found'],
      [new Error('ERROR: Unable to download webpage'), 'unreachable'],
      [new Error('something odd'), 'unknown'],
      ['plain string', 'unknown'],
    ])('classifies %p as %s', (error, reason) => {
      expect(classifyResolveError(error).reason).toBe(reason);
    });
  });

  describe('classifyTransferError', () => {
    it.each([
      [withCode('no space', 'ENOSPC'), 'storage_full'],
      [withCode('permission denied', 'EACCES'), 'disk'],
      [withCode('socket hang up', 'ECONNRESET'), 'network'],
      [new Error('No space left on device'), 'storage_full'],
      [new Error('Connection reset by peer'), 'network'],
      [new Error('weird'), 'unknown'],
    ])('classifies %p as %s', (error, reason) => {
      expect(classifyTransferError(error).reason).toBe(reason);
    });

    it('attaches the checkpoint it is given', () => {
      const checkpoint = { offset: 2048, handle: '/tmp/a.mp4.part' };
      const classified = classifyTransferError(new Error('socket closed'), checkpoint);

      expect(classified).toBeInstanceOf(TransferError);
      expect(classified.checkpoint).toEqual(checkpoint);
    });

    it('keeps an existing transfer error untouched', () => {
      const original = new TransferError('disk', 'read-only', null);
      expect(classifyTransferError(original, { offset: 1, handle: 'x' })).toBe(original);
    });
  });
});
