/**
 * @module primitives/version-accumulator
 * @description Sum of the version field over a packet tree.
 */

import type { Packet } from "../types/packet.js";

/**
 * The packet's own version plus the total version of every child.
 */
export function totalVersion(packet: Packet): number {
  let total: number = packet.version;
  for (const child of packet.children) {
    total += totalVersion(child);
  }
  return total;
}
