export { default as BalanceAggregator, balanceToJSON } from './BalanceAggregator';
export type { BalanceAggregatorOptions, TokenBalanceJSON } from './BalanceAggregator';
