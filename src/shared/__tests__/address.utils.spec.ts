import { parseAddress } from '../address.utils';

describe('parseAddress', () => {
  it('should split on the single @', () => {
    expect(parseAddress('alice@earth.test')).toEqual({ localPart: 'alice', domain: 'earth.test' });
  });

  it('should keep the case of both halves', () => {
    expect(parseAddress('Alice@Earth.Test')).toEqual({ localPart: 'Alice', domain: 'Earth.Test' });
  });

  it('should reject addresses without exactly one @', () => {
    expect(parseAddress('alice.earth.test')).toBeUndefined();
    expect(parseAddress('alice@mail@earth.test')).toBeUndefined();
  });

  it('should reject an empty local part or domain', () => {
    expect(parseAddress('@earth.test')).toBeUndefined();
    expect(parseAddress('alice@')).toBeUndefined();
    expect(parseAddress('')).toBeUndefined();
  });
});
