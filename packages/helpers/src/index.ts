export { ADDRESS_LENGTH, decodeAddress, encodeAddress } from './address';
export type { AddressInput } from './address';
export { concatBytes, copyBytes } from './bytes';
export type { BytesLike } from './bytes';
export { bytesToHex, bytesToUtf8, hexToBytes, isHexString, stripHexPrefix, utf8ToBytes } from './encoding';
export {
  ConfigError,
  CryptoError,
  DecodeError,
  EncodingOverflowError,
  FlowTxError,
  InvalidArgumentError,
  SubmissionError,
  TransactionStateError,
} from './errors';
export type { FlowTxErrorCode, FlowTxErrorOptions } from './errors';
export { padLeft, padRight } from './padding';
