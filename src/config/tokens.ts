import { Chain, CollateralToken } from '../types';

// ERC20 collateral checked by default, in reporting order
export const DEFAULT_COLLATERAL_TOKENS: Record<Chain, readonly CollateralToken[]> = {
  [Chain.ARBITRUM]: [
    { name: 'WBTC', address: '0x2f2a2543B76A4166549F7aaB2e75Bef0aefC5B0f' },
    { name: 'USDC', address: '0xaf88d065e77c8cC2239327C5EDb3A432268e5831' },
    { name: 'USDC.e', address: '0xFF970A61A04b1cA14834A43f5dE4533eBDDB5CC8' },
  ],
};
