/**
 * Schema barrel export.
 * All V1 wire types used between the depository and its clients.
 */

export {
  MarketV1,
  TermsV1,
  MetadataV1,
  AdjustmentV1,
  MarketSummaryV1,
} from "./market.js";

export { NoteV1, PendingV1 } from "./note.js";

export {
  Signed,
  CreateMarketPayload,
  CloseMarketPayload,
  DepositPayload,
  PushNotePayload,
  PullNotePayload,
  RedeemBody,
  ClaimRewardsPayload,
  SetRewardsPayload,
  WhitelistPayload,
  SetAccountPayload,
  SignedCreateMarket,
  SignedCloseMarket,
  SignedDeposit,
  SignedPushNote,
  SignedPullNote,
  SignedClaimRewards,
  SignedSetRewards,
  SignedWhitelist,
  SignedSetAccount,
} from "./requests.js";
