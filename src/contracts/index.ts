export * from './interfaces';
export { GMXContracts } from './GMXContracts';
export type { PositionSource } from './GMXContracts';
export { TokenContracts } from './TokenContracts';
export type { BalanceConnection, BalanceSource } from './TokenContracts';
export { GMX_READER_ABI } from './abis/GMXReader.abi';
export { GMX_DATASTORE_ABI, accountPositionListKey } from './abis/GMXDataStore.abi';
export { ERC20_ABI } from './abis/ERC20.abi';
