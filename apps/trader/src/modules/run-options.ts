/** What the caller resolved for one invocation. */
export type RunOptions = {
  symbol: string;
  amount?: string;
  orderFile: string;
  simulate: boolean;
};
