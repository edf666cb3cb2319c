import { Type } from "@sinclair/typebox";
import type { BondDepository } from "../depository.js";
import type { SignatureCheck } from "../signed.js";

export interface RouteContext extends SignatureCheck {
  depository: BondDepository;
}

export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

export const INVALID_REQUEST = "invalid_request";
