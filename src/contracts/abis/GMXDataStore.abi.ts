/**
 * GMX V2 DataStore Contract ABI (subset)
 * Address: 0xFD70de6b91282D8017aA4E741e9Ae325CAb992d8 (Arbitrum)
 *
 * Used for reading the size of an account's position set
 */

import { AbiCoder, keccak256 } from 'ethers';
import { Address } from '../../types';

export const GMX_DATASTORE_ABI = [
  {
    type: 'function',
    name: 'getBytes32Count',
    stateMutability: 'view',
    inputs: [{ name: 'setKey', type: 'bytes32' }],
    outputs: [{ name: '', type: 'uint256' }]
  }
];

const abiCoder = AbiCoder.defaultAbiCoder();

// keccak256(abi.encode("ACCOUNT_POSITION_LIST"))
export const ACCOUNT_POSITION_LIST = keccak256(abiCoder.encode(['string'], ['ACCOUNT_POSITION_LIST']));

/**
 * DataStore set key holding an account's position keys
 */
export const accountPositionListKey = (account: Address): string =>
  keccak256(abiCoder.encode(['bytes32', 'address'], [ACCOUNT_POSITION_LIST, account]));
