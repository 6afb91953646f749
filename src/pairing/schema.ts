/**
 * Pairing Module - Types
 */

/**
 * What the caller holds between `beginPair` and `finishPair` /
 * `cancelPair`. The session never stores it.
 */
export type PairingData = Readonly<{
  challenge: number;
  pairingToken: number;
  clientId: string;
  clientName: string;
}>;
