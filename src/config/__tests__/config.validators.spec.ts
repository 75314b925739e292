import { isValidDomain, isValidHttpUrl, validateRetryPolicy } from '../config.validators';

describe('isValidDomain', () => {
  it('should accept standard and nested domains', () => {
    expect(isValidDomain('earth.test')).toBe(true);
    expect(isValidDomain('mail.earth.example.org')).toBe(true);
    expect(isValidDomain('my-planet.io')).toBe(true);
  });

  it('should reject labels that start or end with a hyphen', () => {
    expect(isValidDomain('-earth.test')).toBe(false);
    expect(isValidDomain('earth-.test')).toBe(false);
  });

  it('should accept single-label domains', () => {
    expect(isValidDomain('localhost')).toBe(true);
    expect(isValidDomain('earth')).toBe(true);
  });

  it('should reject empty labels and underscores', () => {
    expect(isValidDomain('earth..test')).toBe(false);
    expect(isValidDomain('earth.test.')).toBe(false);
    expect(isValidDomain('bad_label')).toBe(false);
  });

  it('should reject empty strings and spaces', () => {
    expect(isValidDomain('')).toBe(false);
    expect(isValidDomain('earth .test')).toBe(false);
  });
});

describe('isValidHttpUrl', () => {
  it('should accept http and https URLs', () => {
    expect(isValidHttpUrl('http://directory:3000')).toBe(true);
    expect(isValidHttpUrl('https://directory.earth.test')).toBe(true);
  });

  it('should reject other protocols and unparsable values', () => {
    expect(isValidHttpUrl('ftp://directory')).toBe(false);
    expect(isValidHttpUrl('directory:3000:x')).toBe(false);
    expect(isValidHttpUrl('not a url')).toBe(false);
  });
});

describe('validateRetryPolicy', () => {
  it('should accept equal or increasing bounds', () => {
    expect(() => validateRetryPolicy(100, 100)).not.toThrow();
    expect(() => validateRetryPolicy(100, 2000)).not.toThrow();
  });

  it('should reject a maximum below the initial backoff', () => {
    expect(() => validateRetryPolicy(500, 100)).toThrow(
      'MAILRELAY_RELAY_MAX_BACKOFF (100ms) must be greater than or equal to MAILRELAY_RELAY_INITIAL_BACKOFF (500ms)',
    );
  });
});
