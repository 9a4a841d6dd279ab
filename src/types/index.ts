// Fixed-point quantities are decimal strings with 8 fractional digits.
export type Amount = string;

export const MARKET_STATUSES = [
  "Active",
  "Paused",
  "Ended",
  "Resolved",
  "Refunded",
  "Cancelled",
] as const;

export type MarketStatus = (typeof MARKET_STATUSES)[number];

export interface Market {
  id: string;
  question: string;
  description?: string;
  outcomes: string[];
  status: MarketStatus;
  createdBy?: string;
  createdAt: string;
  endTime: string;
  resolutionDeadline?: string;
  initialLiquidity: Amount;
  totalVolume: Amount;
  totalTrades: number;
  winningOutcome?: string;
  /** Set when settlement for a terminal market has been written */
  settledAt?: string;
  /** Set when a pool invariant broke; trading stays halted until cleared */
  haltedReason?: string;
  /** Optimistic concurrency token, bumped on every committed write */
  version: number;
  updatedAt: string;
}

export interface OutcomePoolState {
  marketId: string;
  outcome: string;
  shareReserve: Amount;
  cashReserve: Amount;
  k: Amount;
  initialLiquidity: Amount;
  totalVolume: Amount;
  tradeCount: number;
  updatedAt: string;
}

export const POSITION_STATUSES = ["Open", "Settled", "Voided"] as const;

export type PositionStatus = (typeof POSITION_STATUSES)[number];

export interface Position {
  id: string;
  marketId: string;
  bettor: string;
  outcome: string;
  amountPaid: Amount;
  sharesAcquired: Amount;
  avgPricePerShare: Amount;
  placedAt: string;
  status: PositionStatus;
  settledAt?: string;
}

/** An outcome's implied price right after a trade moved it */
export interface PricePoint {
  marketId: string;
  outcome: string;
  price: string;
  positionRef: string;
  recordedAt: string;
}

export interface ResolutionVote {
  marketId: string;
  voter: string;
  chosenOutcome: string;
  weight: number;
  confidence?: number;
  reasoning?: string;
  evidenceUrl?: string;
  isFinal: boolean;
  createdAt: string;
  updatedAt: string;
}

export type ResolutionMethod =
  | "AdminDecision"
  | "VoteConsensus"
  | "Oracle"
  | "AutoRefund";

export interface Resolution {
  id: string;
  marketId: string;
  /** null only for AutoRefund */
  winningOutcome: string | null;
  method: ResolutionMethod;
  resolvedBy?: string;
  resolvedAt: string;
  voteCount: number;
  totalPool: Amount;
  totalWinningStake: Amount;
  totalLosingStake: Amount;
  houseEdgeBps: number;
  houseEdgeAmount: Amount;
  totalPayout: Amount;
  disputeDeadline?: string;
}

export type PayoutKind = "win" | "refund";

export interface Payout {
  id: string;
  marketId: string;
  positionRef: string;
  bettor: string;
  kind: PayoutKind;
  grossAmount: Amount;
  fee: Amount;
  netAmount: Amount;
  /** netAmount minus the position's amountPaid; negative on a loss */
  profitLoss: Amount;
  createdAt: string;
}

export interface PositionSettlement {
  id: string;
  status: Exclude<PositionStatus, "Open">;
  settledAt: string;
}
