/**
 * Shapes returned by the GMX V2 Reader contract, and their decoders
 */

import { Result, isAddress } from 'ethers';
import { Address } from '../../types';

// Market structure
export interface Market {
  marketToken: Address;
  indexToken: Address;
  longToken: Address;
  shortToken: Address;
}

// Position structure (raw from contract)
export interface PositionStruct {
  account: Address;
  market: Address;
  collateralToken: Address;
  sizeInUsd: bigint;
  sizeInTokens: bigint;
  collateralAmount: bigint;
  borrowingFactor: bigint;
  fundingFeeAmountPerSize: bigint;
  longTokenClaimableFundingAmountPerSize: bigint;
  shortTokenClaimableFundingAmountPerSize: bigint;
  increasedAtBlock: bigint;
  decreasedAtBlock: bigint;
  isLong: boolean;
}

type Fields = Record<string, unknown>;

const toFields = (value: unknown, what: string): Fields => {
  if (value instanceof Result) {
    return value.toObject();
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  throw new TypeError(`Malformed ${what}: expected a tuple`);
};

const readAddress = (fields: Fields, name: string, what: string): Address => {
  const value = fields[name];
  if (typeof value !== 'string' || !isAddress(value)) {
    throw new TypeError(`Malformed ${what}: ${name} is not an address`);
  }
  return value;
};

const readUint = (fields: Fields, name: string, what: string): bigint => {
  const value = fields[name];
  if (typeof value !== 'bigint' || value < 0n) {
    throw new TypeError(`Malformed ${what}: ${name} is not a uint256`);
  }
  return value;
};

const readBool = (fields: Fields, name: string, what: string): boolean => {
  const value = fields[name];
  if (typeof value !== 'boolean') {
    throw new TypeError(`Malformed ${what}: ${name} is not a bool`);
  }
  return value;
};

export const decodeMarket = (value: unknown): Market => {
  const fields = toFields(value, 'market');
  return {
    marketToken: readAddress(fields, 'marketToken', 'market'),
    indexToken: readAddress(fields, 'indexToken', 'market'),
    longToken: readAddress(fields, 'longToken', 'market'),
    shortToken: readAddress(fields, 'shortToken', 'market'),
  };
};

export const decodePositionStruct = (value: unknown): PositionStruct => {
  const fields = toFields(value, 'position');
  const what = 'position';
  return {
    account: readAddress(fields, 'account', what),
    market: readAddress(fields, 'market', what),
    collateralToken: readAddress(fields, 'collateralToken', what),
    sizeInUsd: readUint(fields, 'sizeInUsd', what),
    sizeInTokens: readUint(fields, 'sizeInTokens', what),
    collateralAmount: readUint(fields, 'collateralAmount', what),
    borrowingFactor: readUint(fields, 'borrowingFactor', what),
    fundingFeeAmountPerSize: readUint(fields, 'fundingFeeAmountPerSize', what),
    longTokenClaimableFundingAmountPerSize: readUint(fields, 'longTokenClaimableFundingAmountPerSize', what),
    shortTokenClaimableFundingAmountPerSize: readUint(fields, 'shortTokenClaimableFundingAmountPerSize', what),
    increasedAtBlock: readUint(fields, 'increasedAtBlock', what),
    decreasedAtBlock: readUint(fields, 'decreasedAtBlock', what),
    isLong: readBool(fields, 'isLong', what),
  };
};

export const decodePositionList = (value: unknown): PositionStruct[] => {
  if (!Array.isArray(value)) {
    throw new TypeError('Malformed position list: expected an array');
  }
  return value.map((item: unknown) => decodePositionStruct(item));
};
