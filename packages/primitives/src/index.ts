/**
 * @curvebond/primitives — frozen bond-engine primitives.
 *
 * Pure math, records, errors and wire schemas. No I/O, no state.
 * The depository and the CLI import from here, never the reverse.
 */

// Errors
export { BondError, isBondError, type BondErrorCode } from "./errors.js";

// Fixed point
export { mulDiv, checkedSub, pow10, minBigInt } from "./fixed-point.js";

// Market records + creation math
export {
  createMarketState,
  validateMarketParams,
  cloneMarketState,
  isMarketLive,
  quoteToBase,
  INACTIVE_ADJUSTMENT,
  type Market,
  type Terms,
  type Metadata,
  type Adjustment,
  type MarketState,
  type CreateMarketParams,
  type MarketContext,
} from "./market.js";

// Notes
export { isNoteRedeemable, isNotePending, type Note } from "./note.js";

// Pricing engine
export {
  debtDecay,
  currentDebt,
  controlDecay,
  currentControlVariable,
  debtRatio,
  priceFor,
  marketPrice,
  storedPrice,
  payoutFor,
  decayMarket,
  type ControlDecay,
} from "./pricing.js";

// Tuning controller
export { tuneMarket, isTuneDue, type TuneContext, type TuneResult } from "./tuning.js";

// Canonical encoding + digests
export { canonicalEncode, canonicalDecode } from "./canonical.js";
export { digestBytes, digestObject, fromHex, toHex, type Digest } from "./digest.js";

// Ed25519 + signed requests
export { generateKeypair, publicKeyFor, ed25519Sign, ed25519Verify } from "./ed25519.js";
export {
  signRequestPayload,
  signRequest,
  verifyRequestSignature,
  type SignedRequest,
  type RequestPayload,
} from "./request-signature.js";

// Wire conversion
export { marketStateToWire, noteToWire, parseAmount } from "./wire.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
