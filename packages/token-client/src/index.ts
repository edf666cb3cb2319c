/**
 * @curvebond/token-client — token capability abstraction.
 *
 * The depository moves quote tokens with transferFrom() and pays base tokens
 * with transfer(). Both go through the same TokenAsset interface.
 * MemoryToken backs dev mode and tests.
 */

export type { TokenAsset, MemoryTokenOptions, TransferFailureMode } from "./types.js";

export { MemoryToken } from "./memory-token.js";
export { TokenRegistry } from "./registry.js";
