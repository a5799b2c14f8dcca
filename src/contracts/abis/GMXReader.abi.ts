/**
 * GMX V2 Reader Contract ABI (subset)
 * Address: 0x65A6CC451BAfF7e7B4FDAb4157763aB4b6b44D0E (Arbitrum)
 *
 * Used for querying account positions and market definitions
 */

const POSITION_COMPONENTS = [
  { name: 'account', type: 'address' },
  { name: 'market', type: 'address' },
  { name: 'collateralToken', type: 'address' },
  { name: 'sizeInUsd', type: 'uint256' },
  { name: 'sizeInTokens', type: 'uint256' },
  { name: 'collateralAmount', type: 'uint256' },
  { name: 'borrowingFactor', type: 'uint256' },
  { name: 'fundingFeeAmountPerSize', type: 'uint256' },
  { name: 'longTokenClaimableFundingAmountPerSize', type: 'uint256' },
  { name: 'shortTokenClaimableFundingAmountPerSize', type: 'uint256' },
  { name: 'increasedAtBlock', type: 'uint256' },
  { name: 'decreasedAtBlock', type: 'uint256' },
  { name: 'isLong', type: 'bool' }
];

export const GMX_READER_ABI = [
  {
    type: 'function',
    name: 'getAccountPositions',
    stateMutability: 'view',
    inputs: [
      { name: 'dataStore', type: 'address' },
      { name: 'account', type: 'address' },
      { name: 'start', type: 'uint256' },
      { name: 'end', type: 'uint256' }
    ],
    outputs: [
      {
        type: 'tuple[]',
        components: POSITION_COMPONENTS
      }
    ]
  },
  {
    type: 'function',
    name: 'getMarket',
    stateMutability: 'view',
    inputs: [
      { name: 'dataStore', type: 'address' },
      { name: 'key', type: 'address' }
    ],
    outputs: [
      {
        type: 'tuple',
        components: [
          { name: 'marketToken', type: 'address' },
          { name: 'indexToken', type: 'address' },
          { name: 'longToken', type: 'address' },
          { name: 'shortToken', type: 'address' }
        ]
      }
    ]
  }
];
