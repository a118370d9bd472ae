// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Common-encryption metadata carried by demuxed samples.

export type CryptoScheme = 'none' | 'cenc' | 'cbcs' | 'cbcs-1-9';

export type CryptoSchemeSet = ReadonlySet<Exclude<CryptoScheme, 'none'>>;

export interface InitData {
  type: string;
  data: Uint8Array;
}

/**
 * Per-sample encryption description. Subsample arrays pair up: entry i
 * describes `plainSizes[i]` clear bytes followed by `encryptedSizes[i]`
 * protected bytes.
 */
export interface CryptoSample {
  scheme: CryptoScheme;
  ivSize: number;
  keyId: Uint8Array;
  iv: Uint8Array;
  plainSizes: number[];
  encryptedSizes: number[];
  cryptByteBlock: number;
  skipByteBlock: number;
  constantIV: Uint8Array;
  initDatas: InitData[];
}

export function createCryptoSample(): CryptoSample {
  return {
    scheme: 'none',
    ivSize: 0,
    keyId: new Uint8Array(0),
    iv: new Uint8Array(0),
    plainSizes: [],
    encryptedSizes: [],
    cryptByteBlock: 0,
    skipByteBlock: 0,
    constantIV: new Uint8Array(0),
    initDatas: [],
  };
}

export function isEncrypted(crypto: CryptoSample): boolean {
  return crypto.scheme !== 'none';
}

/** Deep copy; no array or byte buffer is shared with the source. */
export function cloneCryptoSample(crypto: CryptoSample): CryptoSample {
  return {
    scheme: crypto.scheme,
    ivSize: crypto.ivSize,
    keyId: crypto.keyId.slice(),
    iv: crypto.iv.slice(),
    plainSizes: [...crypto.plainSizes],
    encryptedSizes: [...crypto.encryptedSizes],
    cryptByteBlock: crypto.cryptByteBlock,
    skipByteBlock: crypto.skipByteBlock,
    constantIV: crypto.constantIV.slice(),
    initDatas: crypto.initDatas.map((init) => ({ type: init.type, data: init.data.slice() })),
  };
}

/**
 * Render a scheme set as "cenc/cbcs/cbcs-1-9", or "none" when empty.
 */
export function cryptoSchemeSetToString(schemes: CryptoSchemeSet): string {
  const names: string[] = [];
  if (schemes.has('cenc')) names.push('cenc');
  if (schemes.has('cbcs')) names.push('cbcs');
  if (schemes.has('cbcs-1-9')) names.push('cbcs-1-9');
  return names.length > 0 ? names.join('/') : 'none';
}

export function stringToCryptoScheme(value: string): CryptoScheme {
  switch (value) {
    case 'cenc':
    case 'cbcs':
    case 'cbcs-1-9':
      return value;
    default:
      return 'none';
  }
}
