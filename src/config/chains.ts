/**
 * GMX V2 deployments the client can read from
 */

import { Chain, CHAIN_IDS, GMXAddresses } from '../types';

// GMX V2 Arbitrum Contract Addresses
export const GMX_ARBITRUM_ADDRESSES: GMXAddresses = {
  reader: '0x65A6CC451BAfF7e7B4FDAb4157763aB4b6b44D0E',  // GMX V2 SyntheticsReader
  dataStore: '0xFD70de6b91282D8017aA4E741e9Ae325CAb992d8',
};

export interface ChainDeployment {
  chain: Chain;
  chainId: number;
  nativeSymbol: string;
  gmx: GMXAddresses;
  // GMX infra REST API (token list and price tickers)
  apiUrl: string;
}

export const CHAIN_DEPLOYMENTS: Record<Chain, ChainDeployment> = {
  [Chain.ARBITRUM]: {
    chain: Chain.ARBITRUM,
    chainId: CHAIN_IDS[Chain.ARBITRUM],
    nativeSymbol: 'ETH',
    gmx: GMX_ARBITRUM_ADDRESSES,
    apiUrl: 'https://arbitrum-api.gmxinfra.io',
  },
};

export const isChain = (value: string): value is Chain =>
  Object.values(Chain).some((chain) => chain === value);

export const getChainDeployment = (chain: Chain): ChainDeployment => CHAIN_DEPLOYMENTS[chain];
