/**
 * Signed request bodies for the depository's mutating routes.
 */

import { signRequest, type SignedRequest } from "@curvebond/primitives";
import type { LoadedKeys } from "./keys.js";
import { nowSeconds } from "./units.js";

/** Stamp `payload` with the current time and sign it. */
export function signNow<P extends { action: string }>(
  keys: LoadedKeys,
  payload: P,
  timestamp: number = nowSeconds(),
): SignedRequest<P & { timestamp: number }> {
  return signRequest(keys.privateKey, { ...payload, timestamp });
}
