import { parseUnits } from 'ethers';
import { Address, CollateralToken } from '../../src/types';

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

// digit-only addresses are already checksummed
export const TEST_ACCOUNTS: Address[] = [
  '0x1111111111111111111111111111111111111111',
  '0x2222222222222222222222222222222222222222',
];

export const TEST_ADDRESSES = {
  reader: '0x9000000000000000000000000000000000000001',
  dataStore: '0x9000000000000000000000000000000000000002',
};

export const TEST_TOKENS = {
  WETH: '0x8000000000000000000000000000000000000001',
  USDC: '0x8000000000000000000000000000000000000002',
  WBTC: '0x8000000000000000000000000000000000000003',
  USDCe: '0x8000000000000000000000000000000000000004',
};

export const TEST_MARKETS = {
  ETH_USD: '0x7000000000000000000000000000000000000001',
  BTC_USD: '0x7000000000000000000000000000000000000002',
};

export const TEST_TOKEN_INFO = {
  ETH: { address: TEST_TOKENS.WETH, symbol: 'ETH', decimals: 18, synthetic: false },
  USDC: { address: TEST_TOKENS.USDC, symbol: 'USDC', decimals: 6, synthetic: false },
  BTC: { address: TEST_TOKENS.WBTC, symbol: 'BTC', decimals: 8, synthetic: false },
};

export const TEST_COLLATERAL_TOKENS: CollateralToken[] = [
  { name: 'WBTC', address: TEST_TOKENS.WBTC },
  { name: 'USDC', address: TEST_TOKENS.USDC },
  { name: 'USDC.e', address: TEST_TOKENS.USDCe },
];

export const TEST_RPC_URL = 'http://localhost:8545';
export const TEST_API_URL = 'http://gmx-api.test';
export const ARBITRUM_CHAIN_ID = 42161;

// USD prices used by the fake market data
export const ETH_PRICE_USD = 2_000;
export const BTC_PRICE_USD = 60_000;

// 1,000 USD of ETH bought at 2,000 with 200 USDC collateral: 5x leverage
export const ETH_POSITION = {
  sizeInUsd: parseUnits('1000', 30),
  sizeInTokens: parseUnits('0.5', 18),
  collateralAmount: parseUnits('200', 6),
};
