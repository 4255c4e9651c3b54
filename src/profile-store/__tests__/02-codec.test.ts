/**
 * ProfileCodec Tests
 */

import { ProfileDecodeError } from '../errors';
import { decodeProfile, encodeProfile, toStoredProfile } from '../ProfileCodec';
import type { ProfileMetadata } from '../types';

function metadata(overrides: Partial<ProfileMetadata> = {}): ProfileMetadata {
  return {
    data: { coins: 5, cache: { hot: true } },
    createdAt: 1000,
    lastSeen: 2000,
    sessions: 3,
    sessionData: { lastUpdate: 2000, ownerToken: 'srv_a' },
    ...overrides,
  };
}

describe('ProfileCodec', () => {
  describe('toStoredProfile()', () => {
    it('should use the stored field names', () => {
      expect(toStoredProfile(metadata())).toEqual({
        data: { coins: 5, cache: { hot: true } },
        created: 1000,
        last_seen: 2000,
        sessions: 3,
        sessionData: { lastUpdate: 2000, ownerToken: 'srv_a' },
      });
    });

    it('should drop ignored top-level keys', () => {
      expect(toStoredProfile(metadata(), { keysToIgnore: ['cache'] }).data).toEqual({ coins: 5 });
    });

    it('should leave out the lock when releasing', () => {
      expect(toStoredProfile(metadata(), { releaseSession: true })).not.toHaveProperty('sessionData');
    });
  });

  describe('round trip', () => {
    it('should reproduce the document minus ignored keys', () => {
      const decoded = decodeProfile(encodeProfile(metadata(), { keysToIgnore: ['cache'] }));

      expect(decoded).toEqual(metadata({ data: { coins: 5 } }));
    });
  });

  describe('decodeProfile()', () => {
    const valid = { data: {}, created: 1, last_seen: 2, sessions: 0 };

    it('should accept a document without a lock', () => {
      expect(decodeProfile(JSON.stringify(valid))).toEqual({ data: {}, createdAt: 1, lastSeen: 2, sessions: 0 });
    });

    it('should treat a null lock as absent', () => {
      expect(decodeProfile(JSON.stringify({ ...valid, sessionData: null }))).not.toHaveProperty('sessionData');
    });

    it.each([
      ['invalid JSON', '{not json'],
      ['a non-object', '[1,2]'],
      ['missing data', JSON.stringify({ ...valid, data: undefined })],
      ['array data', JSON.stringify({ ...valid, data: [] })],
      ['a string creation time', JSON.stringify({ ...valid, created: 'yesterday' })],
      ['a negative session count', JSON.stringify({ ...valid, sessions: -1 })],
      ['a malformed lock', JSON.stringify({ ...valid, sessionData: { lastUpdate: 1 } })],
      ['an empty lock owner', JSON.stringify({ ...valid, sessionData: { lastUpdate: 1, ownerToken: '' } })],
    ])('should reject %s', (_label, raw) => {
      expect(() => decodeProfile(raw)).toThrow(ProfileDecodeError);
    });

    it('should carry the decode error code', () => {
      let caught: unknown;
      try {
        decodeProfile('[]');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ProfileDecodeError);
      expect(caught).toMatchObject({ code: 'DECODE_ERROR', message: 'Stored profile is not an object' });
    });
  });
});
