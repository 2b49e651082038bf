import {
  bytesToHex as toHex,
  hexToBytes as fromHex,
} from "@noble/hashes/utils";
import type { Hex } from "../types/brands";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHex(bytes)}`;
export const hexToBytes = (hex: Hex): Uint8Array => fromHex(hex.slice(2));
