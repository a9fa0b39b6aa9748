import type { Header } from "./Header.js";

/**
 * Negotiated extension on the receiving side.
 *
 * `unsetBits` returns the header with the reserved bits the extension owns cleared.
 * Throwing rejects the frame.
 */
export interface RecvExtension {
    unsetBits(header:Header):Header;
}
