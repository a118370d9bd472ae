/**
 * Tests for common-encryption sample metadata
 */

import {describe, it, expect} from 'vitest';
import {
  cloneCryptoSample,
  createCryptoSample,
  cryptoSchemeSetToString,
  isEncrypted,
  stringToCryptoScheme,
  type CryptoScheme,
} from '../../lib';

describe('crypto', () => {
  it('should start unencrypted', () => {
    const crypto = createCryptoSample();
    expect(crypto.scheme).toBe('none');
    expect(isEncrypted(crypto)).toBe(false);
    expect(crypto.plainSizes).toEqual([]);
    expect(crypto.keyId.length).toBe(0);
  });

  it('should report a scheme as encrypted', () => {
    const crypto = createCryptoSample();
    crypto.scheme = 'cbcs-1-9';
    expect(isEncrypted(crypto)).toBe(true);
  });

  it('should deep-copy every array', () => {
    const crypto = createCryptoSample();
    crypto.scheme = 'cbcs';
    crypto.ivSize = 16;
    crypto.iv = new Uint8Array([1, 2]);
    crypto.constantIV = new Uint8Array([3]);
    crypto.cryptByteBlock = 1;
    crypto.skipByteBlock = 9;
    crypto.initDatas.push({type: 'cenc', data: new Uint8Array([4])});

    const copy = cloneCryptoSample(crypto);
    crypto.iv[0] = 0;
    crypto.constantIV[0] = 0;
    crypto.initDatas[0].data[0] = 0;
    crypto.initDatas.push({type: 'keyids', data: new Uint8Array(0)});

    expect(copy.scheme).toBe('cbcs');
    expect(copy.ivSize).toBe(16);
    expect(copy.cryptByteBlock).toBe(1);
    expect(copy.skipByteBlock).toBe(9);
    expect(Array.from(copy.iv)).toEqual([1, 2]);
    expect(Array.from(copy.constantIV)).toEqual([3]);
    expect(copy.initDatas).toHaveLength(1);
    expect(copy.initDatas[0].type).toBe('cenc');
    expect(Array.from(copy.initDatas[0].data)).toEqual([4]);
  });

  it('should render scheme sets in a fixed order', () => {
    expect(cryptoSchemeSetToString(new Set<Exclude<CryptoScheme, 'none'>>(['cbcs', 'cenc']))).toBe(
      'cenc/cbcs',
    );
    expect(cryptoSchemeSetToString(new Set<Exclude<CryptoScheme, 'none'>>(['cbcs-1-9']))).toBe(
      'cbcs-1-9',
    );
    expect(cryptoSchemeSetToString(new Set<Exclude<CryptoScheme, 'none'>>())).toBe('none');
  });

  it('should parse scheme names', () => {
    expect(stringToCryptoScheme('cenc')).toBe('cenc');
    expect(stringToCryptoScheme('cbcs')).toBe('cbcs');
    expect(stringToCryptoScheme('cbcs-1-9')).toBe('cbcs-1-9');
    expect(stringToCryptoScheme('cens')).toBe('none');
    expect(stringToCryptoScheme('')).toBe('none');
  });
});
